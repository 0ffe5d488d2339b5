// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';

/**
 * Represents a single application wide multi-layer configuration.
 */
export interface Config {
  /**
   * All the configuration sources which were used to build this configuration, lowest ordinal first.
   */
  readonly sources: ConfigSource[];

  /**
   * Adds a configuration source to the configuration.
   *
   * A {@link ConfigSource} with the same name and ordinal as an existing source will be considered a duplicate,
   * even if it is a different instance.
   *
   * @throws {DuplicateConfigSourceError} if the configuration source has already been added.
   */
  addSource(source: ConfigSource): void;

  asString(key: string): string | undefined;

  asNumber(key: string): number | undefined;

  asBoolean(key: string): boolean | undefined;

  /**
   * Reads a JSON array, or a comma delimited list.
   */
  asStringArray(key: string): string[] | undefined;

  properties(): Map<string, string>;

  refresh(): Promise<void>;
}
