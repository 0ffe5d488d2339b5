// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import url from 'node:url';
import os from 'node:os';

export function getEnvironmentVariable(name: string): string | undefined {
  const value: string | undefined = process.env[name];
  return value && value.trim().length > 0 ? value : undefined;
}

export const ROOT_DIR: string = path.join(path.dirname(url.fileURLToPath(import.meta.url)), '..', '..');
export const RESOURCES_DIR: string = path.join(ROOT_DIR, 'resources');
export const WORDS_DIR: string = path.join(RESOURCES_DIR, 'words');

// -------------------- deployer related constants -----------------------------------------------------------------
export const DEPLOYER_HOME_DIR: string =
  getEnvironmentVariable('CF_DEPLOYER_HOME') || path.join(os.homedir(), '.cf-deployer');
export const DEPLOYER_CONFIG_FILE: string = path.join(DEPLOYER_HOME_DIR, 'deployer.yaml');
export const DEPLOYER_LOG_FILE: string = path.join(DEPLOYER_HOME_DIR, 'logs', 'deployer.log');
export const DEPLOYER_LOG_LEVEL: string = getEnvironmentVariable('CF_DEPLOYER_LOG_LEVEL') || 'info';
export const ENVIRONMENT_PREFIX: string = 'CF_DEPLOYER';

// -------------------- deployment property keys -------------------------------------------------------------------
export const GROUP_PROPERTY_KEY: string = 'deployer.group';
export const COUNT_PROPERTY_KEY: string = 'deployer.count';
export const MEMORY_PROPERTY_KEY: string = 'deployer.memory';
export const DISK_PROPERTY_KEY: string = 'deployer.disk';
export const BUILDPACK_PROPERTY_KEY: string = 'deployer.cloudfoundry.buildpack';
export const SERVICES_PROPERTY_KEY: string = 'deployer.cloudfoundry.services';
export const HEALTH_CHECK_PROPERTY_KEY: string = 'deployer.cloudfoundry.health-check';
export const HEALTH_CHECK_ENDPOINT_PROPERTY_KEY: string = 'deployer.cloudfoundry.health-check-http-endpoint';
export const HEALTH_CHECK_TIMEOUT_PROPERTY_KEY: string = 'deployer.cloudfoundry.health-check-timeout';
export const DOMAIN_PROPERTY_KEY: string = 'deployer.cloudfoundry.domain';
export const HOST_PROPERTY_KEY: string = 'deployer.cloudfoundry.host';
export const ROUTE_PATH_PROPERTY_KEY: string = 'deployer.cloudfoundry.route-path';
export const ROUTES_PROPERTY_KEY: string = 'deployer.cloudfoundry.routes';
export const NO_ROUTE_PROPERTY_KEY: string = 'deployer.cloudfoundry.no-route';
export const USE_SPRING_APPLICATION_JSON_KEY: string = 'deployer.cloudfoundry.use-spring-application-json';
export const STACK_PROPERTY_KEY: string = 'deployer.cloudfoundry.stack';
export const TASK_COMMAND_PROPERTY_KEY: string = 'deployer.cloudfoundry.task-command';

// -------------------- environment variables handed to deployed applications --------------------------------------
export const SPRING_APPLICATION_JSON: string = 'SPRING_APPLICATION_JSON';
export const SPRING_APPLICATION_INDEX: string = 'SPRING_APPLICATION_INDEX';
export const SPRING_CLOUD_APPLICATION_GUID: string = 'SPRING_CLOUD_APPLICATION_GUID';
export const SPRING_CLOUD_APPLICATION_GROUP: string = 'SPRING_CLOUD_APPLICATION_GROUP';
export const JBP_CONFIG_JAVA_MAIN: string = 'JBP_CONFIG_JAVA_MAIN';
export const VCAP_INSTANCE_INDEX: string = '${vcap.application.instance_index}';
export const VCAP_APPLICATION_NAME: string = '${vcap.application.name}';
export const SERVER_PORT_PROPERTY: string = 'server.port';

// -------------------- scheduling -------------------------------------------------------------------------------
export const TASK_DEFINITION_NAME_KEY: string = 'spring-task-definition-name';
export const CRON_EXPRESSION_KEY: string = 'scheduler.cron.expression';

// -------------------- polling budgets ------------------------------------------------------------------------------
export const PACKAGE_READY_MAX_ATTEMPTS: number = 50;
export const PACKAGE_READY_INITIAL_DELAY_SECONDS: number = 5;
export const DROPLET_READY_MAX_ATTEMPTS: number = 50;
export const DROPLET_READY_INITIAL_DELAY_SECONDS: number = 10;
export const READY_MAX_DELAY_MINUTES: number = 1;
export const READY_OVERALL_CAP_MINUTES: number = 10;
export const STATUS_RETRY_MAX_ATTEMPTS: number = 10;
export const MANIFEST_JOB_MAX_ATTEMPTS: number = 120;
export const STARTUP_MAX_ATTEMPTS: number = 120;
