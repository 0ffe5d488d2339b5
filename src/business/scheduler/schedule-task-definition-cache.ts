// SPDX-License-Identifier: Apache-2.0

/**
 * Remembers which task definition each schedule was created from. Entries are hints: a miss is resolved from the
 * platform, and concurrent writers may overwrite each other.
 */
export interface ScheduleTaskDefinitionCache {
  get(scheduleName: string): string | undefined;

  put(scheduleName: string, taskDefinitionName: string): void;

  remove(scheduleName: string): void;
}
