// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {type RandomWords} from './random-words.js';
import {DeployerError} from '../../core/errors/deployer-error.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';

export const ADJECTIVES_FILE: string = 'adjectives.txt';
export const NOUNS_FILE: string = 'nouns.txt';

/**
 * Picks words from the `adjectives.txt` and `nouns.txt` lists, one word per line. The lists are read on first use.
 */
@injectable()
export class WordListRandomWords implements RandomWords {
  private readonly wordsDirectory: string;
  private adjectives?: string[];
  private nouns?: string[];

  public constructor(@inject(InjectTokens.WordsDirectory) wordsDirectory?: string) {
    this.wordsDirectory = patchInject(wordsDirectory, InjectTokens.WordsDirectory, this.constructor.name);
  }

  public adjective(): string {
    this.adjectives ??= this.read(ADJECTIVES_FILE);
    return this.pick(this.adjectives);
  }

  public noun(): string {
    this.nouns ??= this.read(NOUNS_FILE);
    return this.pick(this.nouns);
  }

  private pick(words: string[]): string {
    return words[Math.floor(Math.random() * words.length)];
  }

  private read(fileName: string): string[] {
    const file: string = path.join(this.wordsDirectory, fileName);
    const words: string[] = fs
      .readFileSync(file, 'utf8')
      .split(/\r?\n/)
      .map((word: string): string => word.trim())
      .filter((word: string): boolean => word.length > 0);
    if (words.length === 0) {
      throw new DeployerError(`word list ${file} is empty`);
    }
    return words;
  }
}
