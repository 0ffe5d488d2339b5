// SPDX-License-Identifier: Apache-2.0

export interface Space {
  readonly id: string;
  readonly name: string;
  readonly organizationId: string;
}

export interface ListSpacesRequest {
  readonly names?: string[];
  readonly organizationName?: string;
  readonly page: number;
}
