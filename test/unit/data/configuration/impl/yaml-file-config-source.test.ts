// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {YamlFileConfigSource} from '../../../../../src/data/configuration/impl/yaml-file-config-source.js';
import {ConfigurationError} from '../../../../../src/data/configuration/api/configuration-error.js';
import {expectRejection} from '../../../../helpers/expect-rejection.js';

describe('YamlFileConfigSource', (): void => {
  let directory: string;

  beforeEach((): void => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'cf-deployer-yaml-'));
  });

  afterEach((): void => {
    fs.rmSync(directory, {recursive: true, force: true});
  });

  it('flattens nested mappings into dotted keys', async (): Promise<void> => {
    const file: string = path.join(directory, 'deployer.yaml');
    fs.writeFileSync(file, ['memory: 2g', 'services: [mysql, rabbit]', 'connection:', '  space: dev', ''].join('\n'));
    const source: YamlFileConfigSource = new YamlFileConfigSource(file);

    await source.load();

    expect(Object.fromEntries(source.properties())).to.deep.equal({
      memory: '2g',
      services: '["mysql","rabbit"]',
      'connection.space': 'dev',
    });
  });

  it('treats a missing file as an empty layer', async (): Promise<void> => {
    const source: YamlFileConfigSource = new YamlFileConfigSource(path.join(directory, 'absent.yaml'));

    await source.load();

    expect(source.properties().size).to.equal(0);
  });

  it('rejects a document that is not a mapping', async (): Promise<void> => {
    const file: string = path.join(directory, 'list.yaml');
    fs.writeFileSync(file, '- one\n- two\n');

    const error: ConfigurationError = await expectRejection(new YamlFileConfigSource(file).load(), ConfigurationError);

    expect(error.message).to.equal(`Configuration file must contain a mapping at the top level: ${file}`);
  });
});
