// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {openAsBlob} from 'node:fs';
import {type Packages} from '../../resources/package/packages.js';
import {type CreatePackageRequest, type Package, type PackageType} from '../../resources/package/package.js';
import {type CloudFoundryHttp, type RequestContext} from '../cloud-foundry-http.js';
import {type RawRelationship} from '../raw-page.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

interface RawPackage {
  guid: string;
  type: PackageType;
  state: string;
  relationships?: {app?: RawRelationship};
  links?: {app?: {href: string}};
}

export class RestPackages implements Packages {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async create(request: CreatePackageRequest): Promise<Package> {
    const body: Record<string, unknown> = {
      type: request.type,
      relationships: {app: {data: {guid: request.applicationId}}},
    };
    if (request.type === 'docker') {
      body.data = {image: request.image};
    }

    const raw: RawPackage = await this.http.postJson<RawPackage>(
      'v3/packages',
      body,
      this.context(ResourceOperation.CREATE, request.applicationId),
    );
    return RestPackages.toPackage(raw, request.applicationId);
  }

  public async get(id: string): Promise<Package> {
    const raw: RawPackage = await this.http.getJson<RawPackage>(
      `v3/packages/${id}`,
      this.context(ResourceOperation.READ, id),
    );
    return RestPackages.toPackage(raw);
  }

  public async upload(id: string, filePath: string): Promise<Package> {
    const form: FormData = new FormData();
    form.append('bits', await openAsBlob(filePath), path.basename(filePath));

    const response: {body: string} = await this.http.postBody(
      `v3/packages/${id}/upload`,
      form,
      this.context(ResourceOperation.UPLOAD, id),
    );
    const raw: RawPackage = JSON.parse(response.body);
    return RestPackages.toPackage(raw);
  }

  private context(operation: ResourceOperation, name: string): RequestContext {
    return {operation, type: ResourceType.PACKAGE, name};
  }

  private static toPackage(raw: RawPackage, applicationId?: string): Package {
    const href: string | undefined = raw.links?.app?.href;
    return {
      id: raw.guid,
      type: raw.type,
      state: raw.state,
      applicationId:
        applicationId ?? raw.relationships?.app?.data?.guid ?? (href ? href.slice(href.lastIndexOf('/') + 1) : ''),
    };
  }
}
