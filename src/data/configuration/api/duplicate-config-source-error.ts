// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';
import {type ConfigSource} from '../spi/config-source.js';

export class DuplicateConfigSourceError extends ConfigurationError {
  public constructor(source: ConfigSource) {
    super(`configuration source '${source.name}' with ordinal ${source.ordinal} has already been added`, undefined, {
      name: source.name,
      ordinal: source.ordinal,
    });
  }
}
