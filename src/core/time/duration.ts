// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * An immutable amount of time with millisecond precision.
 */
export class Duration {
  private constructor(private readonly millis: number) {
    if (!Number.isFinite(millis) || millis < 0) {
      throw new IllegalArgumentError(`duration must be a finite, non-negative number of milliseconds: ${millis}`);
    }
  }

  public static ofMillis(millis: number): Duration {
    return new Duration(Math.floor(millis));
  }

  public static ofSeconds(seconds: number): Duration {
    return new Duration(Math.floor(seconds * 1000));
  }

  public static ofMinutes(minutes: number): Duration {
    return new Duration(Math.floor(minutes * 60_000));
  }

  public toMillis(): number {
    return this.millis;
  }

  public multipliedBy(factor: number): Duration {
    return Duration.ofMillis(this.millis * factor);
  }

  public dividedBy(divisor: number): Duration {
    if (divisor <= 0) {
      throw new IllegalArgumentError(`divisor must be positive: ${divisor}`);
    }
    return Duration.ofMillis(this.millis / divisor);
  }

  public plus(other: Duration): Duration {
    return Duration.ofMillis(this.millis + other.millis);
  }

  public compareTo(other: Duration): number {
    return this.millis - other.millis;
  }

  public toString(): string {
    return `${this.millis}ms`;
  }
}
