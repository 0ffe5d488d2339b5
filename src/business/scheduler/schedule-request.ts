// SPDX-License-Identifier: Apache-2.0

import {type AppDeploymentRequest} from '../deployment/app-deployment-request.js';

export interface ScheduleRequest extends AppDeploymentRequest {
  readonly scheduleName: string;
  /** carries the cron expression under `scheduler.cron.expression` */
  readonly schedulerProperties: Readonly<Record<string, string>>;
}
