// SPDX-License-Identifier: Apache-2.0

export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogFile: Symbol.for('LogFile'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  ConfigFile: Symbol.for('ConfigFile'),
  WordsDirectory: Symbol.for('WordsDirectory'),
  DeployerLogger: Symbol.for('DeployerLogger'),
  DeployerProperties: Symbol.for('DeployerProperties'),
  Sleeper: Symbol.for('Sleeper'),
  Clock: Symbol.for('Clock'),
  Poller: Symbol.for('Poller'),
  CloudFoundryClient: Symbol.for('CloudFoundryClient'),
  ApplicationDriver: Symbol.for('ApplicationDriver'),
  PackageDriver: Symbol.for('PackageDriver'),
  DropletDriver: Symbol.for('DropletDriver'),
  TaskDriver: Symbol.for('TaskDriver'),
  JobDriver: Symbol.for('JobDriver'),
  RandomWords: Symbol.for('RandomWords'),
  AppNameGenerator: Symbol.for('AppNameGenerator'),
  DeploymentPropertiesResolver: Symbol.for('DeploymentPropertiesResolver'),
  EnvironmentVariablesBuilder: Symbol.for('EnvironmentVariablesBuilder'),
  StatusReconciler: Symbol.for('StatusReconciler'),
  AppDeployer: Symbol.for('AppDeployer'),
  TaskLauncher: Symbol.for('TaskLauncher'),
  ScheduleTaskDefinitionCache: Symbol.for('ScheduleTaskDefinitionCache'),
  AppScheduler: Symbol.for('AppScheduler'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  AppCommand: Symbol.for('AppCommand'),
  TaskCommand: Symbol.for('TaskCommand'),
  ScheduleCommand: Symbol.for('ScheduleCommand'),
  Commands: Symbol.for('Commands'),
};
