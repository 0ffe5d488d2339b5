// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type RandomWords} from './random-words.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';

/**
 * Derives platform application names: `[prefix-][adjective-noun-]name`.
 *
 * The random part is chosen once per generator, so every application deployed through one process shares it.
 */
@injectable()
export class AppNameGenerator {
  private readonly properties: DeployerProperties;
  private readonly randomWords: RandomWords;
  private readonly logger: DeployerLogger;
  private prefix?: string;

  public constructor(
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.RandomWords) randomWords?: RandomWords,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.randomWords = patchInject(randomWords, InjectTokens.RandomWords, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  public generate(name: string): string {
    const prefix: string = this.resolvePrefix();
    return prefix.length > 0 ? `${prefix}-${name}` : name;
  }

  private resolvePrefix(): string {
    if (this.prefix === undefined) {
      const parts: string[] = [];
      if (this.properties.appNamePrefix.length > 0) {
        parts.push(this.properties.appNamePrefix);
      }
      if (this.properties.enableRandomAppNamePrefix) {
        parts.push(`${this.randomWords.adjective()}-${this.randomWords.noun()}`);
      }
      this.prefix = parts.join('-');
      this.logger.debug(`using application name prefix '${this.prefix}'`);
    }
    return this.prefix;
  }
}
