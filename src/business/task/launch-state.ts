// SPDX-License-Identifier: Apache-2.0

export enum LaunchState {
  LAUNCHING = 'launching',
  RUNNING = 'running',
  COMPLETE = 'complete',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
  ERROR = 'error',
  UNKNOWN = 'unknown',
}
