// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {
  DeploymentPropertiesResolver,
  type HealthCheck,
} from '../../../../src/business/deployment/deployment-properties-resolver.js';
import {UnsupportedHealthCheckError} from '../../../../src/business/deployment/errors/unsupported-health-check-error.js';
import {DeployerProperties} from '../../../../src/core/config/deployer-properties.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('DeploymentPropertiesResolver', (): void => {
  const resolver: DeploymentPropertiesResolver = new DeploymentPropertiesResolver(DeployerProperties.fromPlain());

  describe('sizes', (): void => {
    it('falls back to the deployer defaults', (): void => {
      expect(resolver.memory({})).to.equal(1024);
      expect(resolver.disk({})).to.equal(1024);
    });

    it('reads megabytes and gigabytes', (): void => {
      expect(resolver.memory({'deployer.memory': '512m'})).to.equal(512);
      expect(resolver.disk({'deployer.disk': '2G'})).to.equal(2048);
    });
  });

  describe('instances', (): void => {
    it('defaults to one instance', (): void => {
      expect(resolver.instances({})).to.equal(1);
    });

    it('accepts a positive integer', (): void => {
      expect(resolver.instances({'deployer.count': '3'})).to.equal(3);
    });

    for (const invalid of ['0', '-1', '1.5', 'two']) {
      it(`rejects '${invalid}'`, (): void => {
        expect((): number => resolver.instances({'deployer.count': invalid})).to.throw(
          IllegalArgumentError,
          `Invalid value '${invalid}' for deployer.count: expected a positive integer`,
        );
      });
    }
  });

  describe('healthCheck', (): void => {
    it('defaults to a port check', (): void => {
      expect(resolver.healthCheck({})).to.deep.equal({type: 'port', httpEndpoint: undefined, timeout: undefined});
    });

    it('maps none onto the process check', (): void => {
      expect(resolver.healthCheck({'deployer.cloudfoundry.health-check': 'NONE'}).type).to.equal('process');
    });

    it('keeps the endpoint only for an http check', (): void => {
      const http: HealthCheck = resolver.healthCheck({
        'deployer.cloudfoundry.health-check': 'http',
        'deployer.cloudfoundry.health-check-http-endpoint': '/actuator/health',
        'deployer.cloudfoundry.health-check-timeout': '120',
      });
      const port: HealthCheck = resolver.healthCheck({
        'deployer.cloudfoundry.health-check-http-endpoint': '/actuator/health',
      });

      expect(http).to.deep.equal({type: 'http', httpEndpoint: '/actuator/health', timeout: 120});
      expect(port.httpEndpoint).to.be.undefined;
    });

    it('rejects an unknown check type', (): void => {
      expect((): HealthCheck => resolver.healthCheck({'deployer.cloudfoundry.health-check': 'tcp'})).to.throw(
        UnsupportedHealthCheckError,
        "Unsupported health check type 'tcp', expected one of port, process, http or none",
      );
    });

    it('rejects a timeout that is not a number of seconds', (): void => {
      expect((): HealthCheck => resolver.healthCheck({'deployer.cloudfoundry.health-check-timeout': '2m'})).to.throw(
        IllegalArgumentError,
        "Invalid value '2m' for deployer.cloudfoundry.health-check-timeout: expected seconds",
      );
    });
  });

  describe('routes', (): void => {
    it('prefers explicit routes', (): void => {
      expect(
        resolver.routes('time', {
          'deployer.cloudfoundry.routes': 'a.example.test, b.example.test/path',
          'deployer.cloudfoundry.domain': 'apps.example.test',
        }),
      ).to.deep.equal(['a.example.test', 'b.example.test/path']);
    });

    it('composes host, domain and path', (): void => {
      expect(
        resolver.routes('time', {
          'deployer.cloudfoundry.domain': 'apps.example.test',
          'deployer.cloudfoundry.host': 'clock',
          'deployer.cloudfoundry.route-path': 'api',
        }),
      ).to.deep.equal(['clock.apps.example.test/api']);
    });

    it('uses the deployment id as host', (): void => {
      expect(resolver.routes('time', {'deployer.cloudfoundry.domain': 'apps.example.test'})).to.deep.equal([
        'time.apps.example.test',
      ]);
    });

    it('leaves the route to the platform without a domain', (): void => {
      expect(resolver.routes('time', {})).to.deep.equal([]);
    });
  });

  it('adds requested services to the default ones', (): void => {
    const withDefaults: DeploymentPropertiesResolver = new DeploymentPropertiesResolver(
      DeployerProperties.fromPlain({services: ['config-server']}),
    );

    expect(withDefaults.services({'deployer.cloudfoundry.services': 'mysql, config-server'})).to.deep.equal([
      'config-server',
      'mysql',
    ]);
  });

  it('reads the remaining switches', (): void => {
    expect(resolver.buildpacks({})).to.deep.equal(['java_buildpack']);
    expect(resolver.buildpacks({'deployer.cloudfoundry.buildpack': 'nodejs_buildpack'})).to.deep.equal([
      'nodejs_buildpack',
    ]);
    expect(resolver.stack({'deployer.cloudfoundry.stack': ' cflinuxfs4 '})).to.equal('cflinuxfs4');
    expect(resolver.noRoute({'deployer.cloudfoundry.no-route': 'true'})).to.be.true;
    expect(resolver.useSpringApplicationJson({})).to.be.true;
    expect(resolver.group({'deployer.group': ' ticktock '})).to.equal('ticktock');
    expect(resolver.group({'deployer.group': ' '})).to.be.undefined;
    expect(resolver.taskCommand({'deployer.cloudfoundry.task-command': 'java -jar task.jar'})).to.equal(
      'java -jar task.jar',
    );
  });
});
