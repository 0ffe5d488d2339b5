// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {CloudFoundryApiError} from './cloud-foundry-api-error.js';
import {type ResourceType} from '../resources/resource-type.js';
import {type ResourceOperation} from '../resources/resource-operation.js';

export class ResourceNotFoundError extends CloudFoundryApiError {
  /**
   * @param operation - the operation that was attempted
   * @param resourceType - the kind of resource that was missing
   * @param name - the id or name used for the lookup
   * @param cause - the underlying cause of the error
   */
  public constructor(
    public readonly operation: ResourceOperation,
    public readonly resourceType: ResourceType,
    public readonly resourceName: string,
    cause?: unknown,
  ) {
    super(`failed to ${operation} ${resourceType} '${resourceName}': not found`, StatusCodes.NOT_FOUND, cause, {
      operation,
      resourceType,
      resourceName,
    });
  }
}
