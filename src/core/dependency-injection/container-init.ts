// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type DeployerLogger} from '../logging/deployer-logger.js';
import {DeployerPinoLogger} from '../logging/deployer-pino-logger.js';
import * as constants from '../constants.js';
import {sleep} from '../helpers.js';
import {type Clock, Poller} from '../retry/poller.js';
import {DeployerProperties} from '../config/deployer-properties.js';
import {ErrorHandler} from '../error-handler.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {RestCloudFoundryClient} from '../../integration/cloud-foundry/rest/rest-cloud-foundry-client.js';
import {ApplicationDriver} from '../../business/lifecycle/application-driver.js';
import {PackageDriver} from '../../business/lifecycle/package-driver.js';
import {DropletDriver} from '../../business/lifecycle/droplet-driver.js';
import {TaskDriver} from '../../business/lifecycle/task-driver.js';
import {JobDriver} from '../../business/lifecycle/job-driver.js';
import {WordListRandomWords} from '../../business/deployment/word-list-random-words.js';
import {AppNameGenerator} from '../../business/deployment/app-name-generator.js';
import {DeploymentPropertiesResolver} from '../../business/deployment/deployment-properties-resolver.js';
import {EnvironmentVariablesBuilder} from '../../business/deployment/environment-variables-builder.js';
import {AppDeployer} from '../../business/deployment/app-deployer.js';
import {StatusReconciler} from '../../business/status/status-reconciler.js';
import {TaskLauncher} from '../../business/task/task-launcher.js';
import {InMemoryScheduleTaskDefinitionCache} from '../../business/scheduler/in-memory-schedule-task-definition-cache.js';
import {AppScheduler} from '../../business/scheduler/app-scheduler.js';
import {AppCommand} from '../../commands/app-command.js';
import {TaskCommand} from '../../commands/task-command.js';
import {ScheduleCommand} from '../../commands/schedule-command.js';
import {Commands} from '../../commands/commands.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

const systemClock: Clock = {now: (): number => Date.now()};

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param properties - the deployer settings every component reads
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logFile - file the log records go to, empty for standard output
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    properties: DeployerProperties = DeployerProperties.fromPlain(),
    logLevel: string = constants.DEPLOYER_LOG_LEVEL,
    developmentMode: boolean = false,
    logFile: string = '',
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<DeployerLogger>(InjectTokens.DeployerLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.DeployerLogger, DeployerPinoLogger),
      new SingletonContainer(InjectTokens.Poller, Poller),
      new SingletonContainer(InjectTokens.CloudFoundryClient, RestCloudFoundryClient),
      new SingletonContainer(InjectTokens.ApplicationDriver, ApplicationDriver),
      new SingletonContainer(InjectTokens.PackageDriver, PackageDriver),
      new SingletonContainer(InjectTokens.DropletDriver, DropletDriver),
      new SingletonContainer(InjectTokens.TaskDriver, TaskDriver),
      new SingletonContainer(InjectTokens.JobDriver, JobDriver),
      new SingletonContainer(InjectTokens.RandomWords, WordListRandomWords),
      new SingletonContainer(InjectTokens.AppNameGenerator, AppNameGenerator),
      new SingletonContainer(InjectTokens.DeploymentPropertiesResolver, DeploymentPropertiesResolver),
      new SingletonContainer(InjectTokens.EnvironmentVariablesBuilder, EnvironmentVariablesBuilder),
      new SingletonContainer(InjectTokens.StatusReconciler, StatusReconciler),
      new SingletonContainer(InjectTokens.AppDeployer, AppDeployer),
      new SingletonContainer(InjectTokens.TaskLauncher, TaskLauncher),
      new SingletonContainer(InjectTokens.ScheduleTaskDefinitionCache, InMemoryScheduleTaskDefinitionCache),
      new SingletonContainer(InjectTokens.AppScheduler, AppScheduler),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.AppCommand, AppCommand),
      new SingletonContainer(InjectTokens.TaskCommand, TaskCommand),
      new SingletonContainer(InjectTokens.ScheduleCommand, ScheduleCommand),
      new SingletonContainer(InjectTokens.Commands, Commands),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogFile, logFile),
      new ValueContainer(InjectTokens.ConfigFile, constants.DEPLOYER_CONFIG_FILE),
      new ValueContainer(InjectTokens.WordsDirectory, constants.WORDS_DIR),
      new ValueContainer(InjectTokens.DeployerProperties, properties),
      new ValueContainer(InjectTokens.Sleeper, sleep),
      new ValueContainer(InjectTokens.Clock, systemClock),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<DeployerLogger>(InjectTokens.DeployerLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   */
  public reset(
    properties?: DeployerProperties,
    logLevel?: string,
    developmentMode?: boolean,
    logFile?: string,
    overrides?: InstanceOverrides,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<DeployerLogger>(InjectTokens.DeployerLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(properties, logLevel, developmentMode, logFile, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
