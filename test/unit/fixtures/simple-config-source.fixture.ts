// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../../../src/data/configuration/spi/config-source.js';

export class SimpleConfigSourceFixture implements ConfigSource {
  public loads: number = 0;

  public constructor(
    public readonly name: string,
    public readonly ordinal: number,
    private readonly data: Map<string, string> = new Map<string, string>(),
  ) {}

  public async load(): Promise<void> {
    this.loads++;
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }
}
