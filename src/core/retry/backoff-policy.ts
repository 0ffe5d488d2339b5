// SPDX-License-Identifier: Apache-2.0

import {Duration} from '../time/duration.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * Bounded exponential backoff: the delay after attempt n is `initialDelay * 2^(n-1)`, clamped at `maxDelay`.
 * Both `maxAttempts` and `overallCap` bound a loop run under the policy.
 */
export class BackoffPolicy {
  public constructor(
    public readonly maxAttempts: number,
    public readonly initialDelay: Duration,
    public readonly maxDelay: Duration,
    public readonly overallCap: Duration,
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new IllegalArgumentError(`maxAttempts must be a positive integer: ${maxAttempts}`);
    }
    if (maxDelay.compareTo(initialDelay) < 0) {
      throw new IllegalArgumentError(`maxDelay (${maxDelay}) must not be smaller than initialDelay (${initialDelay})`);
    }
  }

  public static exponential(
    maxAttempts: number,
    initialDelay: Duration,
    maxDelay: Duration,
    overallCap: Duration,
  ): BackoffPolicy {
    return new BackoffPolicy(maxAttempts, initialDelay, maxDelay, overallCap);
  }

  /**
   * A policy that never sleeps longer than `delay` and gives up after `maxAttempts`, with no wall clock cap of its
   * own beyond what `overallCap` allows.
   */
  public static fixed(maxAttempts: number, delay: Duration, overallCap: Duration): BackoffPolicy {
    return new BackoffPolicy(maxAttempts, delay, delay, overallCap);
  }

  /**
   * @param attempt - the 1-based number of the attempt that just failed
   */
  public delayAfter(attempt: number): Duration {
    const exponent: number = Math.max(0, attempt - 1);
    const millis: number = this.initialDelay.toMillis() * Math.pow(2, exponent);
    return Duration.ofMillis(Math.min(millis, this.maxDelay.toMillis()));
  }
}
