// SPDX-License-Identifier: Apache-2.0

import cron from 'node-cron';
import {CronExpressionError} from './errors/cron-expression-error.js';

/**
 * Schedules are written the way the platform scheduler reads them: `minute hour day-of-month month day-of-week`,
 * optionally followed by a year. There is no seconds field; the scheduler fires at second zero.
 */
const MIN_FIELDS: number = 5;
const MAX_FIELDS: number = 6;
const YEAR_FIELD: RegExp = /^(\*|\d{4}([-/,]\d{1,4})*)$/;

/**
 * Rewrites a scheduler expression into one node-cron can check: `?` becomes `*` and a trailing year field is
 * dropped. Quartz only features such as `L`, `W` and `#` are not understood.
 */
export function normalizeCronExpression(expression: string): string {
  const fields: string[] = expression.trim().replaceAll('?', '*').split(/\s+/);
  return (fields.length === MAX_FIELDS ? fields.slice(0, MIN_FIELDS) : fields).join(' ');
}

/**
 * @returns the expression as given, trimmed
 * @throws {CronExpressionError} when the expression is missing or malformed
 */
export function validateCronExpression(expression: string | undefined): string {
  if (expression === undefined || expression.trim().length === 0) {
    throw new CronExpressionError(expression, 'no expression given');
  }

  const fields: string[] = expression.trim().split(/\s+/);
  if (fields.length < MIN_FIELDS || fields.length > MAX_FIELDS) {
    throw new CronExpressionError(expression, `expected ${MIN_FIELDS} or ${MAX_FIELDS} fields, found ${fields.length}`);
  }
  if (fields.length === MAX_FIELDS && !YEAR_FIELD.test(fields[MIN_FIELDS])) {
    throw new CronExpressionError(expression, `'${fields[MIN_FIELDS]}' is not a year`);
  }
  // node-cron reads six fields as seconds first
  if (!cron.validate(`0 ${normalizeCronExpression(expression)}`)) {
    throw new CronExpressionError(expression, 'not a valid cron expression');
  }
  return expression.trim();
}
