// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type ScheduleTaskDefinitionCache} from './schedule-task-definition-cache.js';

@injectable()
export class InMemoryScheduleTaskDefinitionCache implements ScheduleTaskDefinitionCache {
  private readonly entries: Map<string, string> = new Map<string, string>();

  public get(scheduleName: string): string | undefined {
    return this.entries.get(scheduleName);
  }

  public put(scheduleName: string, taskDefinitionName: string): void {
    this.entries.set(scheduleName, taskDefinitionName);
  }

  public remove(scheduleName: string): void {
    this.entries.delete(scheduleName);
  }
}
