// SPDX-License-Identifier: Apache-2.0

import {type DeploymentState} from './deployment-state.js';
import {classifyInstanceState, toDeploymentState} from './instance-state.js';
import {
  type ApplicationDetail,
  type InstanceDetail,
} from '../../integration/cloud-foundry/resources/application/application.js';

export const GUID_ATTRIBUTE: string = 'guid';
export const CF_GUID_ATTRIBUTE: string = 'cf-guid';
export const INDEX_ATTRIBUTE: string = 'index';
export const URL_ATTRIBUTE: string = 'url';
export const CPU_ATTRIBUTE: string = 'metrics.machine.cpu';
export const MEMORY_ATTRIBUTE: string = 'metrics.machine.memory';
export const DISK_ATTRIBUTE: string = 'metrics.machine.disk';

function percentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Status of one replica. The state is mapped when the status is built, so an unsupported platform state fails the
 * whole status query.
 */
export class AppInstanceStatus {
  public readonly id: string;
  public readonly state: DeploymentState;
  public readonly attributes: Readonly<Record<string, string>>;

  public constructor(
    application: ApplicationDetail,
    public readonly index: number,
    detail?: InstanceDetail,
  ) {
    this.id = `${application.name}-${index}`;
    this.state = toDeploymentState(classifyInstanceState(detail?.state));
    this.attributes = Object.freeze(AppInstanceStatus.attributesOf(application, index, detail));
  }

  private static attributesOf(
    application: ApplicationDetail,
    index: number,
    detail?: InstanceDetail,
  ): Record<string, string> {
    const attributes: Record<string, string> = {};

    if (detail?.cpu !== undefined) {
      attributes[CPU_ATTRIBUTE] = percentage(detail.cpu * 100);
    }
    if (detail?.diskUsage !== undefined && detail.diskQuota) {
      attributes[DISK_ATTRIBUTE] = percentage((100 * detail.diskUsage) / detail.diskQuota);
    }
    if (detail?.memoryUsage !== undefined && detail.memoryQuota) {
      attributes[MEMORY_ATTRIBUTE] = percentage((100 * detail.memoryUsage) / detail.memoryQuota);
    }

    if (application.urls.length > 0) {
      attributes[URL_ATTRIBUTE] = `http://${application.urls[0]}`;
      for (const [position, url] of application.urls.entries()) {
        attributes[`${URL_ATTRIBUTE}.${position}`] = `http://${url}`;
      }
    }

    attributes[GUID_ATTRIBUTE] = `${application.name}:${index}`;
    attributes[CF_GUID_ATTRIBUTE] = application.id;
    attributes[INDEX_ATTRIBUTE] = String(index);
    return attributes;
  }

  public toString(): string {
    return `AppInstanceStatus[${this.id} : ${this.state}]`;
  }
}
