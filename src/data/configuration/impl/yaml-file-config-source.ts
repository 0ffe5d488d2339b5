// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import {existsSync} from 'node:fs';
import yaml from 'yaml';
import {type ConfigSource} from '../spi/config-source.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {PropertyFlattener} from './property-flattener.js';

/**
 * Reads a YAML document whose nesting mirrors the configuration keys. A missing file is an empty layer.
 */
export class YamlFileConfigSource implements ConfigSource {
  private data: Map<string, string> = new Map<string, string>();

  public constructor(public readonly filePath: string) {}

  public get name(): string {
    return 'YamlFileConfigSource';
  }

  public get ordinal(): number {
    return 100;
  }

  public async load(): Promise<void> {
    this.data = new Map<string, string>();
    if (!existsSync(this.filePath)) {
      return;
    }

    let document: unknown;
    try {
      document = yaml.parse(await fs.readFile(this.filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read configuration file: ${this.filePath}`, error);
    }

    if (document === null || document === undefined) {
      return;
    }
    if (typeof document !== 'object' || Array.isArray(document)) {
      throw new ConfigurationError(`Configuration file must contain a mapping at the top level: ${this.filePath}`);
    }

    this.data = PropertyFlattener.flatten(document);
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }
}
