// SPDX-License-Identifier: Apache-2.0

export interface ScheduleInfo {
  readonly scheduleName: string;
  readonly taskDefinitionName: string;
  readonly scheduleProperties: Readonly<Record<string, string>>;
}
