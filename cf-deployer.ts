#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import * as deployer from './src/index.js';
import {type DeployerLogger} from './src/core/logging/deployer-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: DeployerLogger} = {};
await deployer
  .main(process.argv, context)
  .then((): void => {
    context.logger?.info('cf-deployer completed, via entrypoint');
  })
  .catch((error: unknown): void => {
    if (!container.isRegistered(InjectTokens.ErrorHandler, true)) {
      console.error(error);
      process.exitCode = 1;
      return;
    }
    const errorHandler: ErrorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
