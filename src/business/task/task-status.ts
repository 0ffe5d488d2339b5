// SPDX-License-Identifier: Apache-2.0

import {LaunchState} from './launch-state.js';
import {UnsupportedStateError} from '../../core/errors/unsupported-state-error.js';

export interface TaskStatus {
  readonly taskId: string;
  readonly state: LaunchState;
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * @throws {UnsupportedStateError} for a task state outside the known set
 */
export function toLaunchState(raw: string): LaunchState {
  switch (raw) {
    case 'SUCCEEDED': {
      return LaunchState.COMPLETE;
    }
    case 'RUNNING': {
      return LaunchState.RUNNING;
    }
    case 'PENDING': {
      return LaunchState.LAUNCHING;
    }
    case 'CANCELING': {
      return LaunchState.CANCELLED;
    }
    case 'FAILED': {
      return LaunchState.FAILED;
    }
    default: {
      throw new UnsupportedStateError('task', raw);
    }
  }
}
