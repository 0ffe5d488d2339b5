// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {toMegabytes} from '../../../../src/business/deployment/byte-size.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('toMegabytes', (): void => {
  it('reads plain numbers as megabytes', (): void => {
    expect(toMegabytes('512', 'deployer.memory')).to.equal(512);
    expect(toMegabytes(' 256M ', 'deployer.memory')).to.equal(256);
  });

  it('converts gigabytes', (): void => {
    expect(toMegabytes('2g', 'deployer.disk')).to.equal(2048);
  });

  it('rejects fractions and other units', (): void => {
    expect((): number => toMegabytes('1.5g', 'deployer.disk')).to.throw(
      IllegalArgumentError,
      "Invalid value '1.5g' for deployer.disk",
    );
    expect((): number => toMegabytes('1t', 'deployer.disk')).to.throw(IllegalArgumentError);
  });
});
