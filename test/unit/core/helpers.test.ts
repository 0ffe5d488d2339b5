// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {commaDelimitedListToSet, hasText, parseBoolean, withTimeout} from '../../../src/core/helpers.js';
import {Duration} from '../../../src/core/time/duration.js';
import {OperationTimeoutError} from '../../../src/core/errors/operation-timeout-error.js';
import {expectRejection} from '../../helpers/expect-rejection.js';

describe('helpers', (): void => {
  describe('withTimeout', (): void => {
    it('resolves with the value of a promise that settles in time', async (): Promise<void> => {
      const value: number = await withTimeout(Promise.resolve(42), Duration.ofSeconds(1), 'answer');

      expect(value).to.equal(42);
    });

    it('rejects when the timer wins', async (): Promise<void> => {
      const never: Promise<void> = new Promise<void>((): void => {});

      const error: OperationTimeoutError = await expectRejection(
        withTimeout(never, Duration.ofMillis(5), 'push of app'),
        OperationTimeoutError,
      );

      expect(error.message).to.equal('push of app did not complete within 5ms');
    });
  });

  it('splits comma delimited lists into a set', (): void => {
    expect([...commaDelimitedListToSet(' a, b ,,a ')]).to.deep.equal(['a', 'b']);
    expect(commaDelimitedListToSet(undefined).size).to.equal(0);
  });

  it('detects text', (): void => {
    expect(hasText('x')).to.be.true;
    expect(hasText('  ')).to.be.false;
    expect(hasText(undefined)).to.be.false;
  });

  it('parses booleans with a default', (): void => {
    expect(parseBoolean('TRUE', false)).to.be.true;
    expect(parseBoolean('no', true)).to.be.false;
    expect(parseBoolean(undefined, true)).to.be.true;
  });
});
