// SPDX-License-Identifier: Apache-2.0

export type PackageType = 'bits' | 'docker';

export interface Package {
  readonly id: string;
  readonly type: PackageType;
  /** AWAITING_UPLOAD, PROCESSING_UPLOAD, READY, FAILED, COPYING or EXPIRED */
  readonly state: string;
  readonly applicationId: string;
}

export interface CreatePackageRequest {
  readonly applicationId: string;
  readonly type: PackageType;
  readonly image?: string;
}
