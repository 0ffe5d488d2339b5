// SPDX-License-Identifier: Apache-2.0

import yaml from 'yaml';
import {type ApplicationManifest} from '../resources/application/application-manifest.js';

/**
 * Renders the manifest in the layout the platform's apply_manifest action reads.
 */
export function toManifestYaml(manifest: ApplicationManifest): string {
  const application: Record<string, unknown> = {
    name: manifest.name,
    instances: manifest.instances,
    memory: `${manifest.memory}M`,
    disk_quota: `${manifest.disk}M`,
    'health-check-type': manifest.healthCheckType,
  };

  if (manifest.dockerImage) {
    application.docker = {image: manifest.dockerImage};
  } else if (manifest.buildpacks.length > 0) {
    application.buildpacks = manifest.buildpacks;
  }
  if (manifest.stack) {
    application.stack = manifest.stack;
  }
  if (manifest.healthCheckType === 'http' && manifest.healthCheckHttpEndpoint) {
    application['health-check-http-endpoint'] = manifest.healthCheckHttpEndpoint;
  }
  if (manifest.healthCheckTimeout !== undefined) {
    application.timeout = manifest.healthCheckTimeout;
  }

  if (manifest.noRoute) {
    application['no-route'] = true;
  } else if (manifest.routes.length > 0) {
    application.routes = manifest.routes.map((route: string): {route: string} => ({route}));
  } else {
    application['default-route'] = true;
  }

  if (manifest.services.length > 0) {
    application.services = manifest.services;
  }
  if (Object.keys(manifest.environmentVariables).length > 0) {
    application.env = manifest.environmentVariables;
  }

  return yaml.stringify({applications: [application]});
}
