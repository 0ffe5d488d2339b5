// SPDX-License-Identifier: Apache-2.0

/**
 * One layer of configuration. Keys are dotted camel case paths such as `scheduler.listTimeoutSeconds`, values
 * are the raw strings as found in the layer.
 */
export interface ConfigSource {
  /**
   * Name of the source, unique together with the ordinal.
   */
  readonly name: string;

  /**
   * Precedence of the source: when several sources define a key, the one with the highest ordinal wins.
   */
  readonly ordinal: number;

  /**
   * (Re)reads the underlying data.
   */
  load(): Promise<void>;

  properties(): Map<string, string>;
}
