// SPDX-License-Identifier: Apache-2.0

export interface Task {
  readonly id: string;
  readonly name: string;
  /** PENDING, RUNNING, SUCCEEDED, CANCELING or FAILED */
  readonly state: string;
  readonly command?: string;
  readonly dropletId?: string;
  readonly failureReason?: string;
  readonly createdAt?: string;
}

export interface CreateTaskRequest {
  readonly applicationId: string;
  readonly name: string;
  readonly command: string;
  readonly dropletId: string;
  /** mebibytes */
  readonly memory: number;
  /** mebibytes */
  readonly disk: number;
}
