// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {WordListRandomWords} from '../../../../src/business/deployment/word-list-random-words.js';
import {DeployerError} from '../../../../src/core/errors/deployer-error.js';
import {WORDS_DIR} from '../../../../src/core/constants.js';

describe('WordListRandomWords', (): void => {
  let directory: string;

  beforeEach((): void => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'cf-deployer-words-'));
  });

  afterEach((): void => {
    fs.rmSync(directory, {recursive: true, force: true});
  });

  it('picks from the bundled lists', (): void => {
    const adjectives: string[] = fs.readFileSync(path.join(WORDS_DIR, 'adjectives.txt'), 'utf8').split(/\r?\n/);
    const nouns: string[] = fs.readFileSync(path.join(WORDS_DIR, 'nouns.txt'), 'utf8').split(/\r?\n/);
    const words: WordListRandomWords = new WordListRandomWords(WORDS_DIR);

    expect(adjectives).to.include(words.adjective());
    expect(nouns).to.include(words.noun());
  });

  it('ignores blank lines', (): void => {
    fs.writeFileSync(path.join(directory, 'adjectives.txt'), '\n  quiet  \n\n');

    expect(new WordListRandomWords(directory).adjective()).to.equal('quiet');
  });

  it('fails on an empty list', (): void => {
    fs.writeFileSync(path.join(directory, 'nouns.txt'), '\n');

    expect((): string => new WordListRandomWords(directory).noun()).to.throw(DeployerError, 'is empty');
  });
});
