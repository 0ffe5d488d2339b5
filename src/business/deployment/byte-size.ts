// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

const BYTE_SIZE_PATTERN: RegExp = /^(\d+)([mg]?)$/i;

/**
 * Parses sizes such as `512`, `512m` or `2G` into mebibytes.
 */
export function toMegabytes(value: string, propertyName: string): number {
  const match: RegExpExecArray | null = BYTE_SIZE_PATTERN.exec(value.trim());
  if (!match) {
    throw new IllegalArgumentError(
      `Invalid value '${value}' for ${propertyName}: expected a whole number optionally followed by m or g`,
      undefined,
      {propertyName, value},
    );
  }

  const amount: number = Number.parseInt(match[1], 10);
  return match[2].toLowerCase() === 'g' ? amount * 1024 : amount;
}
