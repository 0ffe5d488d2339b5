// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type DeployerLogger} from '../core/logging/deployer-logger.js';
import {CommandBuilder, Subcommand} from '../core/command-path-builders/command-builder.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type AppDeployer} from '../business/deployment/app-deployer.js';
import {type DeploymentHandle} from '../business/deployment/deployment-handle.js';
import {type AsyncOperation} from '../business/deployment/async-operation.js';
import {type AppStatus} from '../business/status/app-status.js';
import {type AppInstanceStatus} from '../business/status/app-instance-status.js';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';

@injectable()
export class AppCommand extends BaseCommand {
  private readonly deployer: AppDeployer;

  public constructor(
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
    @inject(InjectTokens.AppDeployer) deployer?: AppDeployer,
  ) {
    super(patchInject(logger, InjectTokens.DeployerLogger, AppCommand.name));
    this.deployer = patchInject(deployer, InjectTokens.AppDeployer, this.constructor.name);
  }

  public static readonly COMMAND_NAME: string = 'app';
  private static readonly DESCRIPTION: string = 'Deploy, inspect, scale and remove long running applications.';

  public static readonly DEPLOY_FLAGS_LIST: CommandFlags = {
    required: [flags.definitionName],
    optional: [
      flags.group,
      flags.path,
      flags.image,
      flags.property,
      flags.deploymentProperty,
      flags.argument,
      flags.wait,
    ],
  };

  public static readonly UNDEPLOY_FLAGS_LIST: CommandFlags = {
    required: [flags.deploymentId],
    optional: [flags.wait],
  };

  public static readonly STATUS_FLAGS_LIST: CommandFlags = {
    required: [flags.deploymentId],
    optional: [],
  };

  public static readonly SCALE_FLAGS_LIST: CommandFlags = {
    required: [flags.deploymentId, flags.count],
    optional: [flags.memory, flags.disk, flags.wait],
  };

  public async deploy(argv: ArgvStruct): Promise<void> {
    const handle: DeploymentHandle = await this.deployer.deploy(this.deploymentRequest(argv));
    this.logger.showUser(`Deploying ${handle.id}`);

    if (flags.readBoolean(argv, flags.wait)) {
      await handle.completion();
      this.logger.showUser(`Deployed ${handle.id}`);
    }
  }

  public async undeploy(argv: ArgvStruct): Promise<void> {
    const operation: AsyncOperation = await this.deployer.undeploy(flags.readRequiredString(argv, flags.deploymentId));
    await this.settle(operation, argv);
  }

  public async status(argv: ArgvStruct): Promise<void> {
    const status: AppStatus = await this.deployer.status(flags.readRequiredString(argv, flags.deploymentId));
    this.logger.showUser(`${status.deploymentId}: ${status.state}`);
    this.logger.showList(
      'Instances',
      status.instances.map(
        (instance: AppInstanceStatus): string =>
          `${instance.id} ${instance.state} ${Object.entries(instance.attributes)
            .map(([key, value]: [string, string]): string => `${key}=${value}`)
            .join(' ')}`,
      ),
    );
  }

  public async scale(argv: ArgvStruct): Promise<void> {
    const operation: AsyncOperation = await this.deployer.scale({
      deploymentId: flags.readRequiredString(argv, flags.deploymentId),
      count: flags.readNumber(argv, flags.count) ?? 0,
      memory: flags.readString(argv, flags.memory),
      disk: flags.readString(argv, flags.disk),
    });
    await this.settle(operation, argv);
  }

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(AppCommand.COMMAND_NAME, AppCommand.DESCRIPTION, this.logger)
      .addSubcommand(
        new Subcommand(
          'deploy',
          'Deploys an application and starts its instances.',
          this.deploy.bind(this),
          AppCommand.DEPLOY_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'undeploy',
          'Deletes a deployed application and its routes.',
          this.undeploy.bind(this),
          AppCommand.UNDEPLOY_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'status',
          'Shows the state of a deployment and each of its instances.',
          this.status.bind(this),
          AppCommand.STATUS_FLAGS_LIST,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'scale',
          'Changes the instance count, and optionally the memory and disk limits.',
          this.scale.bind(this),
          AppCommand.SCALE_FLAGS_LIST,
        ),
      )
      .build();
  }
}
