// SPDX-License-Identifier: Apache-2.0

import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';
import {type DeployerLogger} from '../core/logging/deployer-logger.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {
  type AppDeploymentRequest,
  type DeploymentResource,
  dockerResource,
  fileResource,
} from '../business/deployment/app-deployment-request.js';
import {type AsyncOperation} from '../business/deployment/async-operation.js';
import {Flags as flags} from './flags.js';
import * as constants from '../core/constants.js';

export abstract class BaseCommand {
  protected constructor(protected readonly logger: DeployerLogger) {}

  public abstract getCommandDefinition(): CommandDefinition;

  /**
   * Builds a deployment request from `--name`, `--path` or `--image`, and the repeated property and argument flags.
   */
  protected deploymentRequest(argv: ArgvStruct): AppDeploymentRequest {
    return {
      definition: {
        name: flags.readRequiredString(argv, flags.definitionName),
        properties: flags.readKeyValues(argv, flags.property),
      },
      resource: this.resource(argv),
      deploymentProperties: this.deploymentProperties(argv),
      commandlineArguments: flags.readList(argv, flags.argument),
    };
  }

  /**
   * Waits for the operation when `--wait` is set. Without it the operation keeps running and logs its own outcome.
   */
  protected async settle(operation: AsyncOperation, argv: ArgvStruct): Promise<void> {
    if (!flags.readBoolean(argv, flags.wait)) {
      this.logger.showUser(`${operation.description} started`);
      return;
    }
    await operation.completion();
    this.logger.showUser(`${operation.description} finished`);
  }

  private deploymentProperties(argv: ArgvStruct): Record<string, string> {
    const properties: Record<string, string> = flags.readKeyValues(argv, flags.deploymentProperty);
    const group: string | undefined = flags.readString(argv, flags.group);
    if (group !== undefined) {
      properties[constants.GROUP_PROPERTY_KEY] = group;
    }
    return properties;
  }

  private resource(argv: ArgvStruct): DeploymentResource {
    const path: string | undefined = flags.readString(argv, flags.path);
    if (path !== undefined) {
      return fileResource(path);
    }
    const image: string | undefined = flags.readString(argv, flags.image);
    if (image !== undefined) {
      return dockerResource(image);
    }
    throw new IllegalArgumentError(`one of --${flags.path.name} or --${flags.image.name} is required`);
  }
}
