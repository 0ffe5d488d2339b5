// SPDX-License-Identifier: Apache-2.0

import {CloudFoundryHttp, type RequestContext} from './cloud-foundry-http.js';
import {type Poller} from '../../../core/retry/poller.js';
import {BackoffPolicy} from '../../../core/retry/backoff-policy.js';
import {Duration} from '../../../core/time/duration.js';
import {CloudFoundryApiError} from '../errors/cloud-foundry-api-error.js';
import * as constants from '../../../core/constants.js';

interface RawPlatformJob {
  guid: string;
  operation: string;
  state: 'PROCESSING' | 'POLLING' | 'COMPLETE' | 'FAILED';
  errors?: {detail?: string; title?: string}[];
}

/**
 * Waits for the asynchronous jobs the platform returns from 202 Accepted responses.
 */
export class PlatformJobTracker {
  public constructor(
    private readonly http: CloudFoundryHttp,
    private readonly poller: Poller,
  ) {}

  public async awaitCompletion(location: string, timeout: Duration, context: RequestContext): Promise<void> {
    const path: string = CloudFoundryHttp.relativePath(location);
    const job: RawPlatformJob = await this.poller.waitUntil(
      (): Promise<RawPlatformJob> => this.http.getJson<RawPlatformJob>(path, context),
      (current: RawPlatformJob): boolean => current.state === 'COMPLETE' || current.state === 'FAILED',
      BackoffPolicy.exponential(constants.MANIFEST_JOB_MAX_ATTEMPTS, Duration.ofSeconds(1), Duration.ofSeconds(15), timeout),
      `${context.operation} ${context.type} '${context.name}'`,
    );

    if (job.state === 'FAILED') {
      const details: string = (job.errors ?? [])
        .map((error: {detail?: string; title?: string}): string => error.detail ?? error.title ?? 'unknown error')
        .join('; ');
      throw new CloudFoundryApiError(
        `failed to ${context.operation} ${context.type} '${context.name}': ${job.operation} ${details}`,
        undefined,
        undefined,
        {...context, job: job.guid},
      );
    }
  }
}
