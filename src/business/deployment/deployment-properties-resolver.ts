// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {toMegabytes} from './byte-size.js';
import {UnsupportedHealthCheckError} from './errors/unsupported-health-check-error.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {commaDelimitedListToSet, hasText, parseBoolean} from '../../core/helpers.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type HealthCheckType} from '../../integration/cloud-foundry/resources/application/application-manifest.js';

export type DeploymentProperties = Readonly<Record<string, string>>;

export interface HealthCheck {
  readonly type: HealthCheckType;
  readonly httpEndpoint?: string;
  /** seconds */
  readonly timeout?: number;
}

/**
 * Reads platform settings from per request deployment properties, falling back to the deployer defaults.
 */
@injectable()
export class DeploymentPropertiesResolver {
  private readonly defaults: DeployerProperties;

  public constructor(@inject(InjectTokens.DeployerProperties) defaults?: DeployerProperties) {
    this.defaults = patchInject(defaults, InjectTokens.DeployerProperties, this.constructor.name);
  }

  /**
   * Runs every parse that can fail, so bad input is reported before the platform is contacted.
   */
  public validate(properties: DeploymentProperties): void {
    this.memory(properties);
    this.disk(properties);
    this.instances(properties);
    this.healthCheck(properties);
  }

  /** mebibytes */
  public memory(properties: DeploymentProperties): number {
    return toMegabytes(properties[constants.MEMORY_PROPERTY_KEY] ?? this.defaults.memory, constants.MEMORY_PROPERTY_KEY);
  }

  /** mebibytes */
  public disk(properties: DeploymentProperties): number {
    return toMegabytes(properties[constants.DISK_PROPERTY_KEY] ?? this.defaults.disk, constants.DISK_PROPERTY_KEY);
  }

  public instances(properties: DeploymentProperties): number {
    const raw: string | undefined = properties[constants.COUNT_PROPERTY_KEY];
    if (raw === undefined) {
      return this.defaults.instances;
    }
    if (!/^\d+$/.test(raw.trim()) || Number.parseInt(raw, 10) < 1) {
      throw new IllegalArgumentError(`Invalid value '${raw}' for ${constants.COUNT_PROPERTY_KEY}: expected a positive integer`);
    }
    return Number.parseInt(raw, 10);
  }

  /**
   * `none` is accepted as a synonym of `process`, the platform's check that only watches the process.
   */
  public healthCheck(properties: DeploymentProperties): HealthCheck {
    const raw: string = (properties[constants.HEALTH_CHECK_PROPERTY_KEY] ?? this.defaults.healthCheck).trim();
    let type: HealthCheckType;
    switch (raw.toLowerCase()) {
      case 'port': {
        type = 'port';
        break;
      }
      case 'process':
      case 'none': {
        type = 'process';
        break;
      }
      case 'http': {
        type = 'http';
        break;
      }
      default: {
        throw new UnsupportedHealthCheckError(raw);
      }
    }

    const timeout: string | undefined = properties[constants.HEALTH_CHECK_TIMEOUT_PROPERTY_KEY];
    if (timeout !== undefined && !/^\d+$/.test(timeout.trim())) {
      throw new IllegalArgumentError(
        `Invalid value '${timeout}' for ${constants.HEALTH_CHECK_TIMEOUT_PROPERTY_KEY}: expected seconds`,
      );
    }

    return {
      type,
      httpEndpoint:
        type === 'http'
          ? (properties[constants.HEALTH_CHECK_ENDPOINT_PROPERTY_KEY] ?? this.defaults.healthCheckHttpEndpoint)
          : undefined,
      timeout: timeout === undefined ? this.defaults.healthCheckTimeout : Number.parseInt(timeout, 10),
    };
  }

  public buildpacks(properties: DeploymentProperties): string[] {
    const buildpack: string = properties[constants.BUILDPACK_PROPERTY_KEY] ?? this.defaults.buildpack;
    return hasText(buildpack) ? [buildpack.trim()] : [];
  }

  public stack(properties: DeploymentProperties): string | undefined {
    const stack: string | undefined = properties[constants.STACK_PROPERTY_KEY];
    return hasText(stack) ? stack.trim() : this.defaults.stack;
  }

  /**
   * The default services, followed by the ones the request adds.
   */
  public services(properties: DeploymentProperties): string[] {
    return [
      ...new Set<string>([
        ...this.defaults.services,
        ...commaDelimitedListToSet(properties[constants.SERVICES_PROPERTY_KEY]),
      ]),
    ];
  }

  public noRoute(properties: DeploymentProperties): boolean {
    return parseBoolean(properties[constants.NO_ROUTE_PROPERTY_KEY], false);
  }

  /**
   * Explicit routes win. Otherwise a route is composed when a domain is known: the host defaults to the deployment id.
   * No routes at all leaves the choice of a default route to the platform.
   */
  public routes(deploymentId: string, properties: DeploymentProperties): string[] {
    const explicit: Set<string> = commaDelimitedListToSet(properties[constants.ROUTES_PROPERTY_KEY]);
    if (explicit.size > 0) {
      return [...explicit];
    }

    const domain: string | undefined = properties[constants.DOMAIN_PROPERTY_KEY] ?? this.defaults.domain;
    if (!hasText(domain)) {
      return [];
    }
    const host: string = properties[constants.HOST_PROPERTY_KEY] ?? this.defaults.host ?? deploymentId;
    const routePath: string = properties[constants.ROUTE_PATH_PROPERTY_KEY] ?? this.defaults.routePath ?? '';
    const path: string = routePath.length === 0 || routePath.startsWith('/') ? routePath : `/${routePath}`;
    return [`${host}.${domain}${path}`];
  }

  public useSpringApplicationJson(properties: DeploymentProperties): boolean {
    return parseBoolean(
      properties[constants.USE_SPRING_APPLICATION_JSON_KEY],
      this.defaults.useSpringApplicationJson,
    );
  }

  public group(properties: DeploymentProperties): string | undefined {
    const group: string | undefined = properties[constants.GROUP_PROPERTY_KEY];
    return hasText(group) ? group.trim() : undefined;
  }

  public taskCommand(properties: DeploymentProperties): string | undefined {
    const command: string | undefined = properties[constants.TASK_COMMAND_PROPERTY_KEY];
    return hasText(command) ? command.trim() : undefined;
  }
}
