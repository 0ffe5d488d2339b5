// SPDX-License-Identifier: Apache-2.0

/**
 * A staging run of a package. Once staged it references the droplet it produced.
 */
export interface Build {
  readonly id: string;
  /** STAGING, STAGED or FAILED */
  readonly state: string;
  readonly packageId: string;
  readonly dropletId?: string;
  readonly error?: string;
}

export interface CreateBuildRequest {
  readonly packageId: string;
  /** mebibytes */
  readonly stagingMemory: number;
  /** mebibytes */
  readonly stagingDisk: number;
}
