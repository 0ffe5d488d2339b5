// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class SchedulerSchema {
  @Expose()
  public url: string;

  @Expose()
  public scheduleTimeoutSeconds: number;

  @Expose()
  public unscheduleTimeoutSeconds: number;

  @Expose()
  public listTimeoutSeconds: number;

  @Expose()
  public scheduleSslRetryCount: number;

  @Expose()
  public scheduleSslRetryDelayMillis: number;

  public constructor(
    url?: string,
    scheduleTimeoutSeconds?: number,
    unscheduleTimeoutSeconds?: number,
    listTimeoutSeconds?: number,
    scheduleSslRetryCount?: number,
    scheduleSslRetryDelayMillis?: number,
  ) {
    this.url = url ?? '';
    this.scheduleTimeoutSeconds = scheduleTimeoutSeconds ?? 30;
    this.unscheduleTimeoutSeconds = unscheduleTimeoutSeconds ?? 30;
    this.listTimeoutSeconds = listTimeoutSeconds ?? 60;
    this.scheduleSslRetryCount = scheduleSslRetryCount ?? 5;
    this.scheduleSslRetryDelayMillis = scheduleSslRetryDelayMillis ?? 1000;
  }
}
