// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';

/**
 * Awaits the promise and returns what it rejected with, failing the test unless it rejects with the given type.
 */
export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  type: new (...arguments_: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  return expect.fail(`expected a rejection with ${type.name}`);
}
