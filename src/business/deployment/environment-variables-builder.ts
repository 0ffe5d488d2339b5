// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import yaml from 'yaml';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';

export interface ApplicationEnvironmentOptions {
  readonly properties: Readonly<Record<string, string>>;
  readonly commandlineArguments: readonly string[];
  readonly group?: string;
  readonly useSpringApplicationJson: boolean;
}

/**
 * Builds the environment a deployed application starts with. The `${vcap...}` placeholders are expanded by the
 * platform when an instance starts.
 */
@injectable()
export class EnvironmentVariablesBuilder {
  private readonly logger: DeployerLogger;

  public constructor(@inject(InjectTokens.DeployerLogger) logger?: DeployerLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  public forApplication(options: ApplicationEnvironmentOptions): Record<string, string> {
    const environment: Record<string, string> = this.forProperties(
      options.properties,
      options.useSpringApplicationJson,
    );

    if (options.commandlineArguments.length > 0) {
      environment[constants.JBP_CONFIG_JAVA_MAIN] = EnvironmentVariablesBuilder.javaMainConfig(
        options.commandlineArguments,
      );
    }
    if (options.group) {
      environment[constants.SPRING_CLOUD_APPLICATION_GROUP] = options.group;
    }
    environment[constants.SPRING_CLOUD_APPLICATION_GUID] =
      `${constants.VCAP_APPLICATION_NAME}:${constants.VCAP_INSTANCE_INDEX}`;
    environment[constants.SPRING_APPLICATION_INDEX] = constants.VCAP_INSTANCE_INDEX;
    return environment;
  }

  /**
   * Either one SPRING_APPLICATION_JSON entry holding every property, or one entry per property. In the per property
   * form `server.port` is dropped: the platform assigns the port.
   */
  public forProperties(
    properties: Readonly<Record<string, string>>,
    useSpringApplicationJson: boolean,
  ): Record<string, string> {
    const environment: Record<string, string> = {};
    if (Object.keys(properties).length === 0) {
      return environment;
    }

    if (useSpringApplicationJson) {
      environment[constants.SPRING_APPLICATION_JSON] = JSON.stringify(properties);
      return environment;
    }

    for (const [key, value] of Object.entries(properties)) {
      if (key === constants.SERVER_PORT_PROPERTY) {
        this.logger.warn(`Ignoring ${constants.SERVER_PORT_PROPERTY}=${value}, the port is assigned by the platform`);
        continue;
      }
      environment[key] = value;
    }
    return environment;
  }

  private static javaMainConfig(commandlineArguments: readonly string[]): string {
    return yaml
      .stringify({arguments: commandlineArguments.join(' ')}, {defaultKeyType: 'PLAIN', defaultStringType: 'QUOTE_DOUBLE'})
      .trim();
  }
}
