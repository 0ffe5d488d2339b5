// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type DeployerLogger} from '../core/logging/deployer-logger.js';
import {CommandBuilder, Subcommand} from '../core/command-path-builders/command-builder.js';
import * as constants from '../core/constants.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type AppScheduler} from '../business/scheduler/app-scheduler.js';
import {type ScheduleInfo} from '../business/scheduler/schedule-info.js';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';

@injectable()
export class ScheduleCommand extends BaseCommand {
  private readonly scheduler: AppScheduler;

  public constructor(
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
    @inject(InjectTokens.AppScheduler) scheduler?: AppScheduler,
  ) {
    super(patchInject(logger, InjectTokens.DeployerLogger, ScheduleCommand.name));
    this.scheduler = patchInject(scheduler, InjectTokens.AppScheduler, this.constructor.name);
  }

  public static readonly COMMAND_NAME: string = 'schedule';
  private static readonly DESCRIPTION: string = 'Run tasks on a cron schedule.';

  public static readonly CREATE_FLAGS_LIST: CommandFlags = {
    required: [flags.definitionName, flags.scheduleName, flags.cronExpression],
    optional: [flags.path, flags.image, flags.property, flags.deploymentProperty, flags.argument],
  };

  public static readonly DELETE_FLAGS_LIST: CommandFlags = {
    required: [flags.scheduleName],
    optional: [],
  };

  public static readonly LIST_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [flags.definitionName],
  };

  public async create(argv: ArgvStruct): Promise<void> {
    const scheduleName: string = flags.readRequiredString(argv, flags.scheduleName);
    await this.scheduler.schedule({
      ...this.deploymentRequest(argv),
      scheduleName,
      schedulerProperties: {[constants.CRON_EXPRESSION_KEY]: flags.readRequiredString(argv, flags.cronExpression)},
    });
    this.logger.showUser(`Created schedule ${scheduleName}`);
  }

  public async delete(argv: ArgvStruct): Promise<void> {
    const scheduleName: string = flags.readRequiredString(argv, flags.scheduleName);
    await this.scheduler.unschedule(scheduleName);
    this.logger.showUser(`Deleted schedule ${scheduleName}`);
  }

  public async list(argv: ArgvStruct): Promise<void> {
    const schedules: ScheduleInfo[] = await this.scheduler.listSchedules(flags.readString(argv, flags.definitionName));
    this.logger.showList(
      'Schedules',
      schedules.map(
        (schedule: ScheduleInfo): string =>
          `${schedule.scheduleName} (${schedule.taskDefinitionName}) ${
            schedule.scheduleProperties[constants.CRON_EXPRESSION_KEY] ?? ''
          }`.trimEnd(),
      ),
    );
  }

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(ScheduleCommand.COMMAND_NAME, ScheduleCommand.DESCRIPTION, this.logger)
      .addSubcommand(
        new Subcommand(
          'create',
          'Stages the task application and creates a job that runs it on the cron expression.',
          this.create.bind(this),
          ScheduleCommand.CREATE_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'delete',
          'Deletes a schedule and its job.',
          this.delete.bind(this),
          ScheduleCommand.DELETE_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'list',
          'Lists schedules, optionally only those of one task definition.',
          this.list.bind(this),
          ScheduleCommand.LIST_FLAGS_LIST,
        ),
      )
      .build();
  }
}
