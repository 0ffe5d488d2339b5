// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

export class CronExpressionError extends IllegalArgumentError {
  public constructor(
    public readonly expression: string | undefined,
    reason: string,
  ) {
    super(`Invalid cron expression '${expression ?? ''}': ${reason}`, undefined, {expression});
  }
}
