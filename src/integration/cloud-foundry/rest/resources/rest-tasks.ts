// SPDX-License-Identifier: Apache-2.0

import {type Tasks} from '../../resources/task/tasks.js';
import {type CreateTaskRequest, type Task} from '../../resources/task/task.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

interface RawTask {
  guid: string;
  name: string;
  state: string;
  command?: string;
  droplet_guid?: string;
  result?: {failure_reason: string | null};
  created_at?: string;
}

export class RestTasks implements Tasks {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async create(request: CreateTaskRequest): Promise<Task> {
    const raw: RawTask = await this.http.postJson<RawTask>(
      `v3/apps/${request.applicationId}/tasks`,
      {
        name: request.name,
        command: request.command,
        droplet_guid: request.dropletId,
        memory_in_mb: request.memory,
        disk_in_mb: request.disk,
      },
      {operation: ResourceOperation.CREATE, type: ResourceType.TASK, name: request.name},
    );
    return RestTasks.toTask(raw);
  }

  public async get(id: string): Promise<Task> {
    const raw: RawTask = await this.http.getJson<RawTask>(`v3/tasks/${id}`, {
      operation: ResourceOperation.READ,
      type: ResourceType.TASK,
      name: id,
    });
    return RestTasks.toTask(raw);
  }

  public async cancel(id: string): Promise<Task> {
    const raw: RawTask = await this.http.postJson<RawTask>(`v3/tasks/${id}/actions/cancel`, undefined, {
      operation: ResourceOperation.CANCEL,
      type: ResourceType.TASK,
      name: id,
    });
    return RestTasks.toTask(raw);
  }

  private static toTask(raw: RawTask): Task {
    return {
      id: raw.guid,
      name: raw.name,
      state: raw.state,
      command: raw.command,
      dropletId: raw.droplet_guid,
      failureReason: raw.result?.failure_reason ?? undefined,
      createdAt: raw.created_at,
    };
  }
}
