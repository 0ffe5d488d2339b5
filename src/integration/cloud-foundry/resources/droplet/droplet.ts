// SPDX-License-Identifier: Apache-2.0

export interface Droplet {
  readonly id: string;
  /** AWAITING_UPLOAD, PROCESSING_UPLOAD, STAGED, COPYING, FAILED or EXPIRED */
  readonly state: string;
  /** process type name to start command, e.g. `web` */
  readonly processTypes: Record<string, string>;
  readonly createdAt: string;
}
