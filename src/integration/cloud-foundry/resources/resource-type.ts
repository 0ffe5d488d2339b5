// SPDX-License-Identifier: Apache-2.0

export enum ResourceType {
  APPLICATION = 'application',
  PACKAGE = 'package',
  BUILD = 'build',
  DROPLET = 'droplet',
  TASK = 'task',
  SERVICE_INSTANCE = 'service instance',
  SERVICE_BINDING = 'service binding',
  JOB = 'job',
  SPACE = 'space',
  ORGANIZATION = 'organization',
  ROUTE = 'route',
}
