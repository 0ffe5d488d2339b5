// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {PropertyFlattener} from './property-flattener.js';

/**
 * The built in defaults, taken from a plain object.
 */
export class DefaultConfigSource implements ConfigSource {
  private data: Map<string, string> = new Map<string, string>();

  public constructor(private readonly defaults: object) {}

  public get name(): string {
    return 'DefaultConfigSource';
  }

  public get ordinal(): number {
    return 0;
  }

  public async load(): Promise<void> {
    this.data = PropertyFlattener.flatten(this.defaults);
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }
}
