// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../api/config.js';
import {type ConfigSource} from '../spi/config-source.js';
import {DuplicateConfigSourceError} from '../api/duplicate-config-source-error.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {StringEx} from '../../../business/utils/string-ex.js';

function byOrdinal(a: ConfigSource, b: ConfigSource): number {
  return a.ordinal - b.ordinal;
}

export class LayeredConfig implements Config {
  private readonly _sources: ConfigSource[];

  public constructor(sources: ConfigSource[] = []) {
    this._sources = [...sources].sort(byOrdinal);
  }

  public get sources(): ConfigSource[] {
    return [...this._sources];
  }

  public addSource(source: ConfigSource): void {
    if (this._sources.includes(source)) {
      throw new DuplicateConfigSourceError(source);
    }

    if (this._sources.some((s: ConfigSource): boolean => s.name === source.name && s.ordinal === source.ordinal)) {
      throw new DuplicateConfigSourceError(source);
    }

    this._sources.push(source);
    this._sources.sort(byOrdinal);
  }

  public asString(key: string): string | undefined {
    let value: string | undefined;
    for (const source of this._sources) {
      const current: string | undefined = source.properties().get(key);
      if (current !== undefined) {
        value = current;
      }
    }
    return value;
  }

  public asNumber(key: string): number | undefined {
    const value: string | undefined = this.asString(key);
    if (value === undefined || StringEx.isEmpty(value)) {
      return undefined;
    }

    const parsed: number = Number(value);
    if (Number.isNaN(parsed)) {
      throw new ConfigurationError(`configuration key '${key}' is not a number: ${value}`);
    }
    return parsed;
  }

  public asBoolean(key: string): boolean | undefined {
    const value: string | undefined = this.asString(key);
    if (value === undefined || StringEx.isEmpty(value)) {
      return undefined;
    }

    switch (value.trim().toLowerCase()) {
      case 'true': {
        return true;
      }
      case 'false': {
        return false;
      }
      default: {
        throw new ConfigurationError(`configuration key '${key}' is not a boolean: ${value}`);
      }
    }
  }

  public asStringArray(key: string): string[] | undefined {
    const value: string | undefined = this.asString(key);
    if (value === undefined) {
      return undefined;
    }

    const trimmed: string = value.trim();
    if (!trimmed.startsWith('[')) {
      return StringEx.splitList(trimmed);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigurationError(`configuration key '${key}' is not a valid JSON array: ${value}`, error);
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigurationError(`configuration key '${key}' is not an array: ${value}`);
    }
    return parsed.map((item: unknown): string => String(item));
  }

  public properties(): Map<string, string> {
    const finalMap: Map<string, string> = new Map<string, string>();

    for (const source of this._sources) {
      for (const [key, value] of source.properties().entries()) {
        finalMap.set(key, value);
      }
    }

    return finalMap;
  }

  public async refresh(): Promise<void> {
    for (const source of this._sources) {
      await source.load();
    }
  }
}
