// SPDX-License-Identifier: Apache-2.0

import {type CreateTaskRequest, type Task} from './task.js';

export interface Tasks {
  create(request: CreateTaskRequest): Promise<Task>;

  get(id: string): Promise<Task>;

  cancel(id: string): Promise<Task>;
}
