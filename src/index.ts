// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import * as constants from './core/constants.js';
import {type DeployerLogger} from './core/logging/deployer-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {DeployerError} from './core/errors/deployer-error.js';
import {DeployerPropertiesLoader} from './core/config/deployer-properties-loader.js';
import {type DeployerProperties} from './core/config/deployer-properties.js';
import {ArgumentProcessor} from './argument-processor.js';

export {Container} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {DeployerProperties} from './core/config/deployer-properties.js';
export {DeployerPropertiesLoader} from './core/config/deployer-properties-loader.js';
export {DeployerError} from './core/errors/deployer-error.js';
export {AppDeployer} from './business/deployment/app-deployer.js';
export {type DeploymentHandle, DeploymentPhase} from './business/deployment/deployment-handle.js';
export {type AsyncOperation, type OperationOutcome} from './business/deployment/async-operation.js';
export {
  type AppDeploymentRequest,
  type AppScaleRequest,
  type DeploymentResource,
  dockerResource,
  fileResource,
} from './business/deployment/app-deployment-request.js';
export {type AppStatus} from './business/status/app-status.js';
export {type AppInstanceStatus} from './business/status/app-instance-status.js';
export {DeploymentState} from './business/status/deployment-state.js';
export {TaskLauncher} from './business/task/task-launcher.js';
export {type TaskStatus} from './business/task/task-status.js';
export {LaunchState} from './business/task/launch-state.js';
export {AppScheduler} from './business/scheduler/app-scheduler.js';
export {type ScheduleRequest} from './business/scheduler/schedule-request.js';
export {type ScheduleInfo} from './business/scheduler/schedule-info.js';

export async function main(argv: string[], context?: {logger?: DeployerLogger}): Promise<void> {
  let properties: DeployerProperties;
  try {
    properties = await new DeployerPropertiesLoader(constants.DEPLOYER_CONFIG_FILE).load();
    Container.getInstance().init(properties, constants.DEPLOYER_LOG_LEVEL, false, constants.DEPLOYER_LOG_FILE);
  } catch (error) {
    throw new DeployerError('Error initializing container', error);
  }

  const logger: DeployerLogger = container.resolve<DeployerLogger>(InjectTokens.DeployerLogger);

  if (context) {
    // save the logger so that the entrypoint can use it once the command finished
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(new DeployerError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new DeployerError(`Uncaught Exception, origin: ${origin}`, error));
  });

  logger.debug('Initializing deployer CLI');
  await ArgumentProcessor.process(argv);
}
