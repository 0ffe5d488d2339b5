// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type DeployerLogger} from './logging/deployer-logger.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';

/**
 * Last stop for failures that escape a command: reports them to the operator and marks the process as failed.
 */
@injectable()
export class ErrorHandler {
  private readonly logger: DeployerLogger;

  public constructor(@inject(InjectTokens.DeployerLogger) logger?: DeployerLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }
}
