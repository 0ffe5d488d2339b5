// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type KeyFormatter} from '../../key/key-formatter.js';
import {EnvironmentKeyFormatter} from '../../key/environment-key-formatter.js';

/**
 * A {@link ConfigSource} that reads configuration data from the environment.
 *
 * <p>
 * Only the known keys are looked up, each under the prefixed environment name of the key, so `connection.space`
 * is read from `CF_DEPLOYER_CONNECTION_SPACE`. Values are taken verbatim.
 */
export class EnvironmentConfigSource implements ConfigSource {
  private readonly data: Map<string, string> = new Map<string, string>();
  private readonly formatter: KeyFormatter = EnvironmentKeyFormatter.instance();

  public constructor(
    private readonly prefix: string,
    private readonly keys: Iterable<string>,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {}

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return 200;
  }

  public async load(): Promise<void> {
    this.data.clear();
    for (const key of this.keys) {
      const value: string | undefined = this.environment[this.environmentName(key)];
      if (value !== undefined) {
        this.data.set(key, value);
      }
    }
  }

  public environmentName(key: string): string {
    return this.formatter.join(this.prefix, this.formatter.normalize(key));
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }
}
