// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';
import {OperationTimeoutError} from './errors/operation-timeout-error.js';

export function sleep(duration: Duration): Promise<void> {
  return new Promise<void>((resolve: (value: PromiseLike<void> | void) => void): void => {
    setTimeout(resolve, duration.toMillis());
  });
}

/**
 * Races the given promise against a timer. The timer is always cleared once the race settles; the underlying
 * promise keeps running when the timer wins, its eventual result is ignored.
 *
 * @param expiredError - builds the rejection used when the timer wins, an {@link OperationTimeoutError} by default
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeout: Duration,
  description: string,
  expiredError: () => Error = (): Error => new OperationTimeoutError(description, timeout),
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired: Promise<never> = new Promise<never>((_: (value: never) => void, reject: (reason: Error) => void) => {
    timer = setTimeout((): void => reject(expiredError()), timeout.toMillis());
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function commaDelimitedListToSet(value: string | undefined): Set<string> {
  const result: Set<string> = new Set<string>();
  if (!value) {
    return result;
  }

  for (const item of value.split(',')) {
    const trimmed: string = item.trim();
    if (trimmed.length > 0) {
      result.add(trimmed);
    }
  }

  return result;
}

export function hasText(value: string | undefined | null): value is string {
  return value !== undefined && value !== null && value.trim().length > 0;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!hasText(value)) {
    return defaultValue;
  }
  return value.trim().toLowerCase() === 'true';
}
