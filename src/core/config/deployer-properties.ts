// SPDX-License-Identifier: Apache-2.0

import {plainToInstance} from 'class-transformer';
import {Duration} from '../time/duration.js';
import {DeployerPropertiesSchema} from '../../data/schema/model/deployer/deployer-properties-schema.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export interface ConnectionProperties {
  readonly url: string;
  readonly organization: string;
  readonly space: string;
  readonly accessToken: string;
  readonly skipSslValidation: boolean;
  readonly requestTimeout: Duration;
}

export interface SchedulerProperties {
  readonly url: string;
  readonly scheduleTimeout: Duration;
  readonly unscheduleTimeout: Duration;
  readonly listTimeout: Duration;
  readonly scheduleSslRetryCount: number;
  readonly scheduleSslRetryDelay: Duration;
}

function optional(value: string): string | undefined {
  return value.trim().length > 0 ? value.trim() : undefined;
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new IllegalArgumentError(`${name} must be a positive number: ${value}`);
  }
  return value;
}

/**
 * Process wide deployment defaults. Loaded once at startup and read only afterwards; per request deployment
 * properties override them.
 */
export class DeployerProperties {
  public readonly memory: string;
  public readonly disk: string;
  public readonly buildpack: string;
  public readonly stack?: string;
  public readonly services: readonly string[];
  public readonly instances: number;
  public readonly healthCheck: string;
  public readonly healthCheckHttpEndpoint?: string;
  /** seconds */
  public readonly healthCheckTimeout?: number;
  public readonly domain?: string;
  public readonly host?: string;
  public readonly routePath?: string;
  public readonly useSpringApplicationJson: boolean;
  public readonly apiTimeout: Duration;
  public readonly statusTimeout: Duration;
  public readonly stagingTimeout: Duration;
  public readonly startupTimeout: Duration;
  public readonly taskStatusTimeout: Duration;
  public readonly appNamePrefix: string;
  public readonly enableRandomAppNamePrefix: boolean;
  public readonly connection: ConnectionProperties;
  public readonly scheduler: SchedulerProperties;

  private constructor(schema: DeployerPropertiesSchema) {
    this.memory = schema.memory;
    this.disk = schema.disk;
    this.buildpack = schema.buildpack;
    this.stack = optional(schema.stack);
    this.services = Object.freeze([...schema.services]);
    this.instances = positive('instances', schema.instances);
    this.healthCheck = schema.healthCheck;
    this.healthCheckHttpEndpoint = optional(schema.healthCheckHttpEndpoint);
    this.healthCheckTimeout = schema.healthCheckTimeoutSeconds > 0 ? schema.healthCheckTimeoutSeconds : undefined;
    this.domain = optional(schema.domain);
    this.host = optional(schema.host);
    this.routePath = optional(schema.routePath);
    this.useSpringApplicationJson = schema.useSpringApplicationJson;
    this.apiTimeout = Duration.ofSeconds(positive('apiTimeoutSeconds', schema.apiTimeoutSeconds));
    this.statusTimeout = Duration.ofMillis(positive('statusTimeoutMillis', schema.statusTimeoutMillis));
    this.stagingTimeout = Duration.ofSeconds(positive('stagingTimeoutSeconds', schema.stagingTimeoutSeconds));
    this.startupTimeout = Duration.ofSeconds(positive('startupTimeoutSeconds', schema.startupTimeoutSeconds));
    this.taskStatusTimeout = Duration.ofSeconds(positive('taskStatusTimeoutSeconds', schema.taskStatusTimeoutSeconds));
    this.appNamePrefix = schema.appNamePrefix.trim();
    this.enableRandomAppNamePrefix = schema.enableRandomAppNamePrefix;
    this.connection = Object.freeze({
      url: schema.connection.url,
      organization: schema.connection.organization,
      space: schema.connection.space,
      accessToken: schema.connection.accessToken,
      skipSslValidation: schema.connection.skipSslValidation,
      requestTimeout: Duration.ofSeconds(positive('connection.requestTimeoutSeconds', schema.connection.requestTimeoutSeconds)),
    });
    this.scheduler = Object.freeze({
      url: schema.scheduler.url,
      scheduleTimeout: Duration.ofSeconds(positive('scheduler.scheduleTimeoutSeconds', schema.scheduler.scheduleTimeoutSeconds)),
      unscheduleTimeout: Duration.ofSeconds(
        positive('scheduler.unscheduleTimeoutSeconds', schema.scheduler.unscheduleTimeoutSeconds),
      ),
      listTimeout: Duration.ofSeconds(positive('scheduler.listTimeoutSeconds', schema.scheduler.listTimeoutSeconds)),
      scheduleSslRetryCount: positive('scheduler.scheduleSslRetryCount', schema.scheduler.scheduleSslRetryCount),
      scheduleSslRetryDelay: Duration.ofMillis(schema.scheduler.scheduleSslRetryDelayMillis),
    });
    Object.freeze(this);
  }

  public static fromSchema(schema: DeployerPropertiesSchema): DeployerProperties {
    return new DeployerProperties(schema);
  }

  /**
   * Builds properties from a plain object shaped like the configuration file; missing entries keep their defaults.
   */
  public static fromPlain(plain: object = {}): DeployerProperties {
    return new DeployerProperties(
      plainToInstance(DeployerPropertiesSchema, plain, {exposeDefaultValues: true, excludeExtraneousValues: true}),
    );
  }
}
