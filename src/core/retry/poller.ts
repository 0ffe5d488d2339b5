// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Duration} from '../time/duration.js';
import {type BackoffPolicy} from './backoff-policy.js';
import {PollingExhaustedError} from '../errors/polling-exhausted-error.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {withTimeout} from '../helpers.js';

export type Sleeper = (duration: Duration) => Promise<void>;

export interface Clock {
  now(): number;
}

type AttemptOutcome<T> = {succeeded: true; value: T} | {succeeded: false; error: unknown};

/**
 * Runs polling and retry loops under a {@link BackoffPolicy}.
 *
 * Invocations share nothing but the sleeper and the clock, so independent resources can be awaited concurrently.
 */
@injectable()
export class Poller {
  private readonly sleeper: Sleeper;
  private readonly clock: Clock;

  public constructor(@inject(InjectTokens.Sleeper) sleeper?: Sleeper, @inject(InjectTokens.Clock) clock?: Clock) {
    this.sleeper = patchInject(sleeper, InjectTokens.Sleeper, this.constructor.name);
    this.clock = patchInject(clock, InjectTokens.Clock, this.constructor.name);
  }

  /**
   * Polls until the predicate holds for the polled value and returns that value. Each poll only gets what is left of
   * the overall cap.
   *
   * Errors raised by `poll` are not retried, they propagate to the caller as is.
   *
   * @throws {PollingExhaustedError} when the attempts or the overall cap run out first
   */
  public async waitUntil<T>(
    poll: () => Promise<T>,
    predicate: (value: T) => boolean,
    policy: BackoffPolicy,
    description: string,
  ): Promise<T> {
    const start: number = this.clock.now();

    for (let attempt: number = 1; ; attempt++) {
      const value: T = await this.withinCap(poll, policy, attempt, start, description);
      if (predicate(value)) {
        return value;
      }

      await this.pause(policy, attempt, start, description);
    }
  }

  /**
   * Invokes the operation until it succeeds. Only failures accepted by `shouldRetry` are retried, and each attempt
   * only gets what is left of the overall cap.
   *
   * @throws {PollingExhaustedError} carrying the last failure as its cause when the budget runs out
   */
  public async retry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: BackoffPolicy,
    shouldRetry: (error: unknown) => boolean,
    description: string,
  ): Promise<T> {
    const start: number = this.clock.now();
    let lastError: unknown;

    for (let attempt: number = 1; ; attempt++) {
      const outcome: AttemptOutcome<T> = await this.withinCap(
        async (): Promise<AttemptOutcome<T>> => {
          try {
            return {succeeded: true, value: await operation(attempt)};
          } catch (error) {
            return {succeeded: false, error};
          }
        },
        policy,
        attempt,
        start,
        description,
        lastError,
      );
      if (outcome.succeeded) {
        return outcome.value;
      }
      if (!shouldRetry(outcome.error)) {
        throw outcome.error;
      }

      lastError = outcome.error;
      await this.pause(policy, attempt, start, description, lastError);
    }
  }

  /**
   * Runs one attempt bounded by the time left under the cap. Starting an attempt with nothing left gives up instead.
   */
  private withinCap<T>(
    call: () => Promise<T>,
    policy: BackoffPolicy,
    attempt: number,
    start: number,
    description: string,
    lastError?: unknown,
  ): Promise<T> {
    const elapsed: number = this.clock.now() - start;
    const remaining: number = policy.overallCap.toMillis() - elapsed;
    if (remaining <= 0) {
      return Promise.reject(new PollingExhaustedError(description, attempt - 1, elapsed, lastError));
    }

    return withTimeout(
      call(),
      Duration.ofMillis(remaining),
      description,
      (): Error => new PollingExhaustedError(description, attempt, elapsed + remaining, lastError),
    );
  }

  private async pause(
    policy: BackoffPolicy,
    attempt: number,
    start: number,
    description: string,
    lastError?: unknown,
  ): Promise<void> {
    const elapsed: number = this.clock.now() - start;
    if (attempt >= policy.maxAttempts) {
      throw new PollingExhaustedError(description, attempt, elapsed, lastError);
    }

    const remaining: number = policy.overallCap.toMillis() - elapsed;
    if (remaining <= 0) {
      throw new PollingExhaustedError(description, attempt, elapsed, lastError);
    }

    const delay: number = Math.min(policy.delayAfter(attempt).toMillis(), remaining);
    await this.sleeper(Duration.ofMillis(delay));
  }
}
