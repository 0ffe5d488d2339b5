// SPDX-License-Identifier: Apache-2.0

import {type Clock, Poller, type Sleeper} from '../../src/core/retry/poller.js';
import {type Duration} from '../../src/core/time/duration.js';

/**
 * A clock that only moves when the sleeper is called, so polling loops run instantly but see time pass.
 */
export class ManualTime implements Clock {
  public readonly sleeps: number[] = [];
  private current: number = 0;

  public now(): number {
    return this.current;
  }

  public advance(millis: number): void {
    this.current += millis;
  }

  public readonly sleeper: Sleeper = async (duration: Duration): Promise<void> => {
    this.sleeps.push(duration.toMillis());
    this.current += duration.toMillis();
  };

  public poller(): Poller {
    return new Poller(this.sleeper, this);
  }
}
