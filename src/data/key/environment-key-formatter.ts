// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from './key-formatter.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {StringEx} from '../../business/utils/string-ex.js';

/**
 * Maps dotted camel case configuration keys onto environment variable names: `scheduler.listTimeoutSeconds`
 * becomes `SCHEDULER_LIST_TIMEOUT_SECONDS`.
 */
export class EnvironmentKeyFormatter implements KeyFormatter {
  private static _instance: EnvironmentKeyFormatter;

  public readonly separator: string = StringEx.UNDERSCORE;

  private constructor() {}

  public normalize(key: string): string {
    if (StringEx.isEmpty(key)) {
      return key;
    }

    return StringEx.camelCaseToSnake(key.trim()).toUpperCase().replaceAll(StringEx.PERIOD, this.separator);
  }

  public split(key: string): string[] {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null or undefined');
    }

    return key.split(this.separator);
  }

  public join(...parts: string[]): string {
    return parts.filter((part: string): boolean => !StringEx.isEmpty(part)).join(this.separator);
  }

  public static instance(): KeyFormatter {
    if (!EnvironmentKeyFormatter._instance) {
      EnvironmentKeyFormatter._instance = new EnvironmentKeyFormatter();
    }

    return EnvironmentKeyFormatter._instance;
  }
}
