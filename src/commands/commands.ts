// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type AppCommand} from './app-command.js';
import {type TaskCommand} from './task-command.js';
import {type ScheduleCommand} from './schedule-command.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
@injectable()
export class Commands {
  private readonly app: AppCommand;
  private readonly task: TaskCommand;
  private readonly schedule: ScheduleCommand;

  public constructor(
    @inject(InjectTokens.AppCommand) app?: AppCommand,
    @inject(InjectTokens.TaskCommand) task?: TaskCommand,
    @inject(InjectTokens.ScheduleCommand) schedule?: ScheduleCommand,
  ) {
    this.app = patchInject(app, InjectTokens.AppCommand, this.constructor.name);
    this.task = patchInject(task, InjectTokens.TaskCommand, this.constructor.name);
    this.schedule = patchInject(schedule, InjectTokens.ScheduleCommand, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    return [
      this.app.getCommandDefinition(),
      this.task.getCommandDefinition(),
      this.schedule.getCommandDefinition(),
    ];
  }
}
