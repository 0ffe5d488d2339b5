// SPDX-License-Identifier: Apache-2.0

import {instanceToPlain} from 'class-transformer';
import {DeployerProperties} from './deployer-properties.js';
import {DeployerPropertiesSchema} from '../../data/schema/model/deployer/deployer-properties-schema.js';
import {LayeredConfig} from '../../data/configuration/impl/layered-config.js';
import {DefaultConfigSource} from '../../data/configuration/impl/default-config-source.js';
import {YamlFileConfigSource} from '../../data/configuration/impl/yaml-file-config-source.js';
import {EnvironmentConfigSource} from '../../data/configuration/impl/environment-config-source.js';
import {PropertyFlattener} from '../../data/configuration/impl/property-flattener.js';
import {type Config} from '../../data/configuration/api/config.js';
import * as constants from '../constants.js';

/**
 * Materializes {@link DeployerProperties} from the built in defaults, the optional YAML file and the
 * `CF_DEPLOYER_*` environment variables, in increasing order of precedence.
 */
export class DeployerPropertiesLoader {
  public constructor(
    private readonly configFile: string = constants.DEPLOYER_CONFIG_FILE,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {}

  public async load(): Promise<DeployerProperties> {
    const defaults: Record<string, unknown> = instanceToPlain(new DeployerPropertiesSchema());
    const keys: string[] = [...PropertyFlattener.flatten(defaults).keys()];

    const config: Config = new LayeredConfig([
      new DefaultConfigSource(defaults),
      new YamlFileConfigSource(this.configFile),
      new EnvironmentConfigSource(constants.ENVIRONMENT_PREFIX, keys, this.environment),
    ]);
    await config.refresh();

    return DeployerProperties.fromPlain(this.materialize(config, defaults, ''));
  }

  /**
   * Reads every key the template defines, typed after the template's default value.
   */
  private materialize(config: Config, template: Record<string, unknown>, prefix: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, defaultValue] of Object.entries(template)) {
      const key: string = prefix.length > 0 ? `${prefix}.${name}` : name;
      if (Array.isArray(defaultValue)) {
        result[name] = config.asStringArray(key);
      } else if (typeof defaultValue === 'number') {
        result[name] = config.asNumber(key);
      } else if (typeof defaultValue === 'boolean') {
        result[name] = config.asBoolean(key);
      } else if (typeof defaultValue === 'string') {
        result[name] = config.asString(key);
      } else if (DeployerPropertiesLoader.isRecord(defaultValue)) {
        result[name] = this.materialize(config, defaultValue, key);
      }
    }
    return result;
  }

  private static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
