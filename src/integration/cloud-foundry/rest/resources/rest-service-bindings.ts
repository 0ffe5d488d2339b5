// SPDX-License-Identifier: Apache-2.0

import {type ServiceBindings} from '../../resources/service/service-bindings.js';
import {
  type CreateServiceBindingRequest,
  type ListServiceBindingsRequest,
  type ServiceBinding,
} from '../../resources/service/service.js';
import {type Page} from '../../../../core/pagination/page.js';
import {PageDrainer} from '../../../../core/pagination/page-drainer.js';
import {type Duration} from '../../../../core/time/duration.js';
import {type CloudFoundryHttp, type RequestContext} from '../cloud-foundry-http.js';
import {type PlatformJobTracker} from '../platform-job-tracker.js';
import {type RawPage, type RawRelationship, toPage} from '../raw-page.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';
import {CloudFoundryApiError} from '../../errors/cloud-foundry-api-error.js';
import {StatusCodes} from 'http-status-codes';

interface RawServiceBinding {
  guid: string;
  relationships: {app: RawRelationship; service_instance: RawRelationship};
}

export class RestServiceBindings implements ServiceBindings {
  public constructor(
    private readonly http: CloudFoundryHttp,
    private readonly jobTracker: PlatformJobTracker,
    private readonly jobTimeout: Duration,
  ) {}

  /**
   * Binds the application to the service instance. Bindings to managed services are created asynchronously, in which
   * case the platform job is awaited before the binding is looked up.
   */
  public async create(request: CreateServiceBindingRequest): Promise<ServiceBinding> {
    const context: RequestContext = this.context(ResourceOperation.CREATE, request.serviceInstanceId);
    const response: {statusCode: number; body: string; headers: {location?: string}} = await this.http.postBody(
      'v3/service_credential_bindings',
      JSON.stringify({
        type: 'app',
        relationships: {
          app: {data: {guid: request.applicationId}},
          service_instance: {data: {guid: request.serviceInstanceId}},
        },
      }),
      context,
      'application/json',
    );

    if (response.statusCode !== StatusCodes.ACCEPTED) {
      const raw: RawServiceBinding = JSON.parse(response.body);
      return RestServiceBindings.toBinding(raw);
    }

    if (response.headers.location) {
      await this.jobTracker.awaitCompletion(response.headers.location, this.jobTimeout, context);
    }
    const created: ServiceBinding | undefined = await PageDrainer.find(
      (page: number): Promise<Page<ServiceBinding>> => this.list({applicationId: request.applicationId, page}),
      (binding: ServiceBinding): boolean => binding.serviceInstanceId === request.serviceInstanceId,
    );
    if (!created) {
      throw new CloudFoundryApiError(
        `binding of service instance '${request.serviceInstanceId}' to application '${request.applicationId}' completed but cannot be found`,
      );
    }
    return created;
  }

  public async delete(id: string): Promise<void> {
    const context: RequestContext = this.context(ResourceOperation.DELETE, id);
    const location: string | undefined = await this.http.delete(`v3/service_credential_bindings/${id}`, context);
    if (location) {
      await this.jobTracker.awaitCompletion(location, this.jobTimeout, context);
    }
  }

  public async list(request: ListServiceBindingsRequest): Promise<Page<ServiceBinding>> {
    const raw: RawPage<RawServiceBinding> = await this.http.getJson<RawPage<RawServiceBinding>>(
      'v3/service_credential_bindings',
      this.context(ResourceOperation.LIST, request.applicationId),
      {app_guids: request.applicationId, type: 'app', page: request.page},
    );
    return toPage(raw, RestServiceBindings.toBinding);
  }

  private context(operation: ResourceOperation, name: string): RequestContext {
    return {operation, type: ResourceType.SERVICE_BINDING, name};
  }

  private static toBinding(raw: RawServiceBinding): ServiceBinding {
    return {
      id: raw.guid,
      applicationId: raw.relationships.app.data?.guid ?? '',
      serviceInstanceId: raw.relationships.service_instance.data?.guid ?? '',
    };
  }
}
