// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type DeployerLogger} from '../core/logging/deployer-logger.js';
import {CommandBuilder, Subcommand} from '../core/command-path-builders/command-builder.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type TaskLauncher} from '../business/task/task-launcher.js';
import {type TaskStatus} from '../business/task/task-status.js';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';

@injectable()
export class TaskCommand extends BaseCommand {
  private readonly launcher: TaskLauncher;

  public constructor(
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
    @inject(InjectTokens.TaskLauncher) launcher?: TaskLauncher,
  ) {
    super(patchInject(logger, InjectTokens.DeployerLogger, TaskCommand.name));
    this.launcher = patchInject(launcher, InjectTokens.TaskLauncher, this.constructor.name);
  }

  public static readonly COMMAND_NAME: string = 'task';
  private static readonly DESCRIPTION: string = 'Launch and follow one-off tasks.';

  public static readonly LAUNCH_FLAGS_LIST: CommandFlags = {
    required: [flags.definitionName],
    optional: [flags.path, flags.image, flags.property, flags.deploymentProperty, flags.argument],
  };

  public static readonly TASK_FLAGS_LIST: CommandFlags = {
    required: [flags.taskId],
    optional: [],
  };

  public static readonly CANCEL_FLAGS_LIST: CommandFlags = {
    required: [flags.taskId],
    optional: [flags.wait],
  };

  public static readonly DESTROY_FLAGS_LIST: CommandFlags = {
    required: [flags.applicationName],
    optional: [],
  };

  public async launch(argv: ArgvStruct): Promise<void> {
    const taskId: string = await this.launcher.launch(this.deploymentRequest(argv));
    this.logger.showUser(`Launched task ${taskId}`);
  }

  public async cancel(argv: ArgvStruct): Promise<void> {
    await this.settle(this.launcher.cancel(flags.readRequiredString(argv, flags.taskId)), argv);
  }

  public async status(argv: ArgvStruct): Promise<void> {
    const status: TaskStatus = await this.launcher.taskStatus(flags.readRequiredString(argv, flags.taskId));
    this.logger.showUser(`${status.taskId}: ${status.state}`);
    const attributes: string[] = Object.entries(status.attributes).map(
      ([key, value]: [string, string]): string => `${key}=${value}`,
    );
    if (attributes.length > 0) {
      this.logger.showList('Attributes', attributes);
    }
  }

  public async destroy(argv: ArgvStruct): Promise<void> {
    const applicationName: string = flags.readRequiredString(argv, flags.applicationName);
    await this.launcher.destroy(applicationName);
    this.logger.showUser(`Destroyed ${applicationName}`);
  }

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(TaskCommand.COMMAND_NAME, TaskCommand.DESCRIPTION, this.logger)
      .addSubcommand(
        new Subcommand(
          'launch',
          'Stages the task application when needed and launches a task on it.',
          this.launch.bind(this),
          TaskCommand.LAUNCH_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand('cancel', 'Cancels a running task.', this.cancel.bind(this), TaskCommand.CANCEL_FLAGS_LIST),
      )
      .addSubcommand(
        new Subcommand('status', 'Shows the state of a task.', this.status.bind(this), TaskCommand.TASK_FLAGS_LIST),
      )
      .addSubcommand(
        new Subcommand(
          'destroy',
          'Deletes the application hosting the tasks of a definition.',
          this.destroy.bind(this),
          TaskCommand.DESTROY_FLAGS_LIST,
        ),
      )
      .build();
  }
}
