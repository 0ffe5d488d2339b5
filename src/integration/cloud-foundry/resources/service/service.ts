// SPDX-License-Identifier: Apache-2.0

export interface ServiceInstance {
  readonly id: string;
  readonly name: string;
}

export interface ListServiceInstancesRequest {
  readonly names?: string[];
  readonly spaceId: string;
  readonly page: number;
}

export interface ServiceBinding {
  readonly id: string;
  readonly applicationId: string;
  readonly serviceInstanceId: string;
}

export interface CreateServiceBindingRequest {
  readonly applicationId: string;
  readonly serviceInstanceId: string;
}

export interface ListServiceBindingsRequest {
  readonly applicationId: string;
  readonly page: number;
}
