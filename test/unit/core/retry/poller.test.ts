// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {type Poller} from '../../../../src/core/retry/poller.js';
import {BackoffPolicy} from '../../../../src/core/retry/backoff-policy.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {PollingExhaustedError} from '../../../../src/core/errors/polling-exhausted-error.js';
import {ManualTime} from '../../../helpers/test-time.js';
import {expectRejection} from '../../../helpers/expect-rejection.js';

describe('Poller', (): void => {
  let time: ManualTime;
  let poller: Poller;

  beforeEach((): void => {
    time = new ManualTime();
    poller = time.poller();
  });

  describe('waitUntil', (): void => {
    it('returns the first value that satisfies the predicate', async (): Promise<void> => {
      const states: string[] = ['PENDING', 'PENDING', 'READY'];
      const policy: BackoffPolicy = BackoffPolicy.exponential(
        5,
        Duration.ofMillis(100),
        Duration.ofMillis(1000),
        Duration.ofSeconds(10),
      );

      const result: string = await poller.waitUntil(
        async (): Promise<string> => states.shift() ?? 'EMPTY',
        (state: string): boolean => state === 'READY',
        policy,
        'package',
      );

      expect(result).to.equal('READY');
      expect(time.sleeps).to.deep.equal([100, 200]);
    });

    it('gives up once the attempts are spent', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(3, Duration.ofMillis(10), Duration.ofSeconds(10));
      let polls: number = 0;

      const error: PollingExhaustedError = await expectRejection(
        poller.waitUntil(
          async (): Promise<number> => ++polls,
          (): boolean => false,
          policy,
          'droplet',
        ),
        PollingExhaustedError,
      );

      expect(error.attempts).to.equal(3);
      expect(polls).to.equal(3);
      expect(time.sleeps).to.deep.equal([10, 10]);
    });

    it('never sleeps past the overall cap', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(100, Duration.ofMillis(400), Duration.ofMillis(1000));

      const error: PollingExhaustedError = await expectRejection(
        poller.waitUntil(
          async (): Promise<boolean> => false,
          (done: boolean): boolean => done,
          policy,
          'build',
        ),
        PollingExhaustedError,
      );

      expect(error.elapsedMillis).to.equal(1000);
      expect(time.sleeps).to.deep.equal([400, 400, 200]);
    });

    it('cuts off a poll that outlives the overall cap', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(10, Duration.ofMillis(10), Duration.ofMillis(50));

      const error: PollingExhaustedError = await expectRejection(
        poller.waitUntil(
          (): Promise<boolean> => new Promise<boolean>((): void => {}),
          (done: boolean): boolean => done,
          policy,
          'lease',
        ),
        PollingExhaustedError,
      );

      expect(error.message).to.equal('Gave up on lease after 1 attempt(s) in 50ms');
      expect(time.sleeps).to.deep.equal([]);
    });

    it('stops polling once a slow poll has used up the cap', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(10, Duration.ofMillis(100), Duration.ofMillis(1000));
      let polls: number = 0;

      const error: PollingExhaustedError = await expectRejection(
        poller.waitUntil(
          async (): Promise<boolean> => {
            polls++;
            time.advance(5000);
            return false;
          },
          (done: boolean): boolean => done,
          policy,
          'droplet',
        ),
        PollingExhaustedError,
      );

      expect(error.attempts).to.equal(1);
      expect(polls).to.equal(1);
      expect(time.sleeps).to.deep.equal([]);
    });

    it('propagates a failing poll without retrying it', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(5, Duration.ofMillis(10), Duration.ofSeconds(1));
      let polls: number = 0;

      const error: Error = await expectRejection(
        poller.waitUntil(
          async (): Promise<boolean> => {
            polls++;
            throw new Error('unreachable');
          },
          (): boolean => true,
          policy,
          'task',
        ),
        Error,
      );

      expect(error.message).to.equal('unreachable');
      expect(polls).to.equal(1);
    });
  });

  describe('retry', (): void => {
    it('retries accepted failures and passes the attempt number', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(5, Duration.ofMillis(50), Duration.ofSeconds(1));
      const attempts: number[] = [];

      const result: string = await poller.retry(
        async (attempt: number): Promise<string> => {
          attempts.push(attempt);
          if (attempt < 3) {
            throw new Error('transient');
          }
          return 'done';
        },
        policy,
        (): boolean => true,
        'operation',
      );

      expect(result).to.equal('done');
      expect(attempts).to.deep.equal([1, 2, 3]);
      expect(time.sleeps).to.deep.equal([50, 50]);
    });

    it('rethrows a failure the predicate rejects', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(5, Duration.ofMillis(50), Duration.ofSeconds(1));
      const fatal: Error = new Error('fatal');

      const error: Error = await expectRejection(
        poller.retry(
          async (): Promise<void> => {
            throw fatal;
          },
          policy,
          (failure: unknown): boolean => failure !== fatal,
          'operation',
        ),
        Error,
      );

      expect(error).to.equal(fatal);
      expect(time.sleeps).to.deep.equal([]);
    });

    it('cuts off an attempt that outlives the overall cap', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(5, Duration.ofMillis(50), Duration.ofMillis(200));
      const judged: unknown[] = [];

      const error: PollingExhaustedError = await expectRejection(
        poller.retry(
          (attempt: number): Promise<void> =>
            attempt === 1 ? Promise.reject(new Error('transient')) : new Promise<void>((): void => {}),
          policy,
          (failure: unknown): boolean => {
            judged.push(failure);
            return true;
          },
          'operation',
        ),
        PollingExhaustedError,
      );

      expect(error.message).to.equal('Gave up on operation after 2 attempt(s) in 200ms');
      expect(error.cause).to.be.instanceOf(Error).with.property('message', 'transient');
      expect(judged).to.have.length(1);
      expect(time.sleeps).to.deep.equal([50]);
    });

    it('carries the last failure as the cause when it gives up', async (): Promise<void> => {
      const policy: BackoffPolicy = BackoffPolicy.fixed(2, Duration.ofMillis(50), Duration.ofSeconds(1));
      let count: number = 0;

      const error: PollingExhaustedError = await expectRejection(
        poller.retry(
          async (): Promise<void> => {
            count++;
            throw new Error(`failure ${count}`);
          },
          policy,
          (): boolean => true,
          'operation',
        ),
        PollingExhaustedError,
      );

      expect(error.message).to.equal('Gave up on operation after 2 attempt(s) in 50ms');
      expect(error.cause).to.be.instanceOf(Error).with.property('message', 'failure 2');
    });
  });
});
