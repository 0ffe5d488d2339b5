// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {ConnectionSchema} from './connection-schema.js';
import {SchedulerSchema} from './scheduler-schema.js';

/**
 * Persisted form of the deployer defaults. Empty strings and a zero health check timeout stand for "not set".
 */
@Exclude()
export class DeployerPropertiesSchema {
  @Expose()
  public memory: string = '1024m';

  @Expose()
  public disk: string = '1024m';

  @Expose()
  public buildpack: string = 'java_buildpack';

  @Expose()
  public stack: string = '';

  @Expose()
  public services: string[] = [];

  @Expose()
  public instances: number = 1;

  @Expose()
  public healthCheck: string = 'port';

  @Expose()
  public healthCheckHttpEndpoint: string = '';

  @Expose()
  public healthCheckTimeoutSeconds: number = 0;

  @Expose()
  public domain: string = '';

  @Expose()
  public host: string = '';

  @Expose()
  public routePath: string = '';

  @Expose()
  public useSpringApplicationJson: boolean = true;

  @Expose()
  public apiTimeoutSeconds: number = 360;

  @Expose()
  public statusTimeoutMillis: number = 5000;

  @Expose()
  public stagingTimeoutSeconds: number = 900;

  @Expose()
  public startupTimeoutSeconds: number = 300;

  @Expose()
  public taskStatusTimeoutSeconds: number = 30;

  @Expose()
  public appNamePrefix: string = '';

  @Expose()
  public enableRandomAppNamePrefix: boolean = false;

  @Expose()
  @Type((): typeof ConnectionSchema => ConnectionSchema)
  public connection: ConnectionSchema = new ConnectionSchema();

  @Expose()
  @Type((): typeof SchedulerSchema => SchedulerSchema)
  public scheduler: SchedulerSchema = new SchedulerSchema();
}
