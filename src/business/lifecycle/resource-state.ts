// SPDX-License-Identifier: Apache-2.0

/**
 * Locally observed state of a remote resource. Only a successful poll of the platform moves a handle between states.
 */
export enum ResourceState {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  READY = 'READY',
  STAGED = 'STAGED',
  RUNNING = 'RUNNING',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
  UNKNOWN = 'UNKNOWN',
}
