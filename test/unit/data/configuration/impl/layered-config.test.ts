// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {SimpleConfigSourceFixture} from '../../../fixtures/simple-config-source.fixture.js';
import {LayeredConfig} from '../../../../../src/data/configuration/impl/layered-config.js';
import {DuplicateConfigSourceError} from '../../../../../src/data/configuration/api/duplicate-config-source-error.js';
import {ConfigurationError} from '../../../../../src/data/configuration/api/configuration-error.js';
import {type ConfigSource} from '../../../../../src/data/configuration/spi/config-source.js';

describe('LayeredConfig', (): void => {
  let defaults: SimpleConfigSourceFixture;
  let file: SimpleConfigSourceFixture;
  let environment: SimpleConfigSourceFixture;
  let layeredConfig: LayeredConfig;

  beforeEach((): void => {
    defaults = new SimpleConfigSourceFixture(
      'defaults',
      0,
      new Map<string, string>([
        ['memory', '1024m'],
        ['instances', '1'],
        ['useSpringApplicationJson', 'true'],
        ['services', '[]'],
        ['connection.space', 'default-space'],
      ]),
    );
    file = new SimpleConfigSourceFixture(
      'file',
      100,
      new Map<string, string>([
        ['memory', '2g'],
        ['services', '["mysql","rabbit"]'],
        ['connection.space', 'file-space'],
      ]),
    );
    environment = new SimpleConfigSourceFixture(
      'environment',
      200,
      new Map<string, string>([
        ['connection.space', 'env-space'],
        ['instances', '3'],
      ]),
    );

    layeredConfig = new LayeredConfig([environment, defaults, file]);
  });

  it('orders the sources by ordinal', (): void => {
    expect(layeredConfig.sources.map((source: ConfigSource): string => source.name)).to.deep.equal([
      'defaults',
      'file',
      'environment',
    ]);
  });

  it('lets the source with the highest ordinal win', (): void => {
    expect(layeredConfig.asString('connection.space')).to.equal('env-space');
    expect(layeredConfig.asString('memory')).to.equal('2g');
    expect(layeredConfig.asString('missing')).to.be.undefined;
  });

  it('converts values to the requested type', (): void => {
    expect(layeredConfig.asNumber('instances')).to.equal(3);
    expect(layeredConfig.asBoolean('useSpringApplicationJson')).to.be.true;
    expect(layeredConfig.asStringArray('services')).to.deep.equal(['mysql', 'rabbit']);
  });

  it('reads a comma delimited list as an array', (): void => {
    layeredConfig.addSource(new SimpleConfigSourceFixture('cli', 300, new Map([['services', ' db , ,cache']])));

    expect(layeredConfig.asStringArray('services')).to.deep.equal(['db', 'cache']);
  });

  it('rejects values that do not convert', (): void => {
    layeredConfig.addSource(
      new SimpleConfigSourceFixture(
        'broken',
        300,
        new Map([
          ['instances', 'many'],
          ['useSpringApplicationJson', 'yes'],
          ['services', '["unterminated"'],
        ]),
      ),
    );

    expect((): number | undefined => layeredConfig.asNumber('instances')).to.throw(
      ConfigurationError,
      "configuration key 'instances' is not a number: many",
    );
    expect((): boolean | undefined => layeredConfig.asBoolean('useSpringApplicationJson')).to.throw(
      ConfigurationError,
      "configuration key 'useSpringApplicationJson' is not a boolean: yes",
    );
    expect((): string[] | undefined => layeredConfig.asStringArray('services')).to.throw(
      ConfigurationError,
      "configuration key 'services' is not a valid JSON array",
    );
  });

  it('refuses a source with the same name and ordinal twice', (): void => {
    expect((): void => layeredConfig.addSource(file)).to.throw(DuplicateConfigSourceError);
    expect((): void => layeredConfig.addSource(new SimpleConfigSourceFixture('file', 100))).to.throw(
      DuplicateConfigSourceError,
      "configuration source 'file' with ordinal 100 has already been added",
    );
  });

  it('merges every layer into one property map', (): void => {
    expect(Object.fromEntries(layeredConfig.properties())).to.deep.equal({
      memory: '2g',
      instances: '3',
      useSpringApplicationJson: 'true',
      services: '["mysql","rabbit"]',
      'connection.space': 'env-space',
    });
  });

  it('reloads every source on refresh', async (): Promise<void> => {
    await layeredConfig.refresh();

    expect([defaults.loads, file.loads, environment.loads]).to.deep.equal([1, 1, 1]);
  });
});
