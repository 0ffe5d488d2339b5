// SPDX-License-Identifier: Apache-2.0

export enum ResourceOperation {
  CREATE = 'create',
  READ = 'read',
  LIST = 'list',
  UPDATE = 'update',
  DELETE = 'delete',
  UPLOAD = 'upload',
  CANCEL = 'cancel',
  SCHEDULE = 'schedule',
}
