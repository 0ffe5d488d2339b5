// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import sinon from 'sinon';
import {AppNameGenerator} from '../../../../src/business/deployment/app-name-generator.js';
import {type RandomWords} from '../../../../src/business/deployment/random-words.js';
import {DeployerProperties} from '../../../../src/core/config/deployer-properties.js';
import {TestLogger} from '../../../helpers/test-logger.js';

function generator(plain: object, words: RandomWords): AppNameGenerator {
  return new AppNameGenerator(DeployerProperties.fromPlain(plain), words, new TestLogger());
}

describe('AppNameGenerator', (): void => {
  const words: RandomWords = {adjective: (): string => 'brave', noun: (): string => 'otter'};

  it('returns the name unchanged without a prefix', (): void => {
    expect(generator({}, words).generate('time')).to.equal('time');
  });

  it('prepends the configured prefix', (): void => {
    expect(generator({appNamePrefix: ' dataflow-server '}, words).generate('time')).to.equal('dataflow-server-time');
  });

  it('puts the random words after the configured prefix', (): void => {
    expect(generator({appNamePrefix: 'dataflow', enableRandomAppNamePrefix: true}, words).generate('time')).to.equal(
      'dataflow-brave-otter-time',
    );
  });

  it('chooses the random words once', (): void => {
    const adjective: sinon.SinonStub<[], string> = sinon.stub<[], string>();
    adjective.onFirstCall().returns('brave').onSecondCall().returns('quiet');
    const nameGenerator: AppNameGenerator = generator(
      {enableRandomAppNamePrefix: true},
      {adjective, noun: (): string => 'otter'},
    );

    expect(nameGenerator.generate('time')).to.equal('brave-otter-time');
    expect(nameGenerator.generate('log')).to.equal('brave-otter-log');
    expect(adjective.callCount).to.equal(1);
  });
});
