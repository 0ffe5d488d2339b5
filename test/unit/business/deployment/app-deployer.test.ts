// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {AppDeployer} from '../../../../src/business/deployment/app-deployer.js';
import {
  type AppDeploymentRequest,
  dockerResource,
  fileResource,
} from '../../../../src/business/deployment/app-deployment-request.js';
import {AppNameGenerator} from '../../../../src/business/deployment/app-name-generator.js';
import {DeploymentPropertiesResolver} from '../../../../src/business/deployment/deployment-properties-resolver.js';
import {EnvironmentVariablesBuilder} from '../../../../src/business/deployment/environment-variables-builder.js';
import {type DeploymentHandle, DeploymentPhase} from '../../../../src/business/deployment/deployment-handle.js';
import {type AsyncOperation} from '../../../../src/business/deployment/async-operation.js';
import {type RandomWords} from '../../../../src/business/deployment/random-words.js';
import {AlreadyDeployedError} from '../../../../src/business/deployment/errors/already-deployed-error.js';
import {NotDeployedError} from '../../../../src/business/deployment/errors/not-deployed-error.js';
import {StatusReconciler} from '../../../../src/business/status/status-reconciler.js';
import {DeploymentState} from '../../../../src/business/status/deployment-state.js';
import {DeployerProperties} from '../../../../src/core/config/deployer-properties.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {CloudFoundryApiError} from '../../../../src/integration/cloud-foundry/errors/cloud-foundry-api-error.js';
import {InMemoryCloudFoundryClient} from '../../../helpers/in-memory-cloud-foundry-client.js';
import {ManualTime} from '../../../helpers/test-time.js';
import {TestLogger} from '../../../helpers/test-logger.js';
import {expectRejection} from '../../../helpers/expect-rejection.js';

const fixedWords: RandomWords = {
  adjective: (): string => 'brave',
  noun: (): string => 'otter',
};

const GUID: string = '${vcap.application.name}:${vcap.application.instance_index}';
const INDEX: string = '${vcap.application.instance_index}';

function request(overrides: Partial<AppDeploymentRequest> = {}): AppDeploymentRequest {
  return {
    definition: {name: 'time', properties: {greeting: 'hi'}},
    resource: fileResource('/tmp/time.jar'),
    deploymentProperties: {'deployer.group': 'ticktock'},
    commandlineArguments: [],
    ...overrides,
  };
}

describe('AppDeployer', (): void => {
  let client: InMemoryCloudFoundryClient;
  let logger: TestLogger;
  let deployer: AppDeployer;

  beforeEach((): void => {
    client = new InMemoryCloudFoundryClient();
    logger = new TestLogger();
    const time: ManualTime = new ManualTime();
    const properties: DeployerProperties = DeployerProperties.fromPlain({appNamePrefix: 'dataflow-server'});
    deployer = new AppDeployer(
      client,
      properties,
      new DeploymentPropertiesResolver(properties),
      new EnvironmentVariablesBuilder(logger),
      new AppNameGenerator(properties, fixedWords, logger),
      new StatusReconciler(client, time.poller(), properties, logger),
      logger,
    );
  });

  describe('deploy', (): void => {
    it('prefixes the group and pushes a manifest built from the request', async (): Promise<void> => {
      const handle: DeploymentHandle = await deployer.deploy(request());

      expect(handle.id).to.equal('dataflow-server-ticktock-time');
      expect(handle.phase).to.equal(DeploymentPhase.STARTING);

      await handle.completion();

      expect(handle.phase).to.equal(DeploymentPhase.DEPLOYED);
      expect(client.store.pushes).to.deep.equal([
        {
          name: 'dataflow-server-ticktock-time',
          path: '/tmp/time.jar',
          dockerImage: undefined,
          buildpacks: ['java_buildpack'],
          stack: undefined,
          memory: 1024,
          disk: 1024,
          instances: 1,
          healthCheckType: 'port',
          healthCheckHttpEndpoint: undefined,
          healthCheckTimeout: undefined,
          noRoute: false,
          routes: [],
          services: [],
          environmentVariables: {
            SPRING_APPLICATION_JSON: '{"greeting":"hi"}',
            SPRING_CLOUD_APPLICATION_GROUP: 'ticktock',
            SPRING_CLOUD_APPLICATION_GUID: GUID,
            SPRING_APPLICATION_INDEX: INDEX,
          },
        },
      ]);
    });

    it('refuses an id that is already deployed without pushing again', async (): Promise<void> => {
      const first: DeploymentHandle = await deployer.deploy(request());
      await first.completion();

      const error: AlreadyDeployedError = await expectRejection(deployer.deploy(request()), AlreadyDeployedError);

      expect(error.message).to.equal('App dataflow-server-ticktock-time is already deployed with state deployed');
      expect(client.store.pushes).to.have.lengthOf(1);
    });

    it('refuses an id whose instances have all crashed', async (): Promise<void> => {
      client.store.addApplication('dataflow-server-ticktock-time', {instanceStates: ['CRASHED']});

      const error: AlreadyDeployedError = await expectRejection(deployer.deploy(request()), AlreadyDeployedError);

      expect(error.state).to.equal(DeploymentState.FAILED);
    });

    it('validates the request before contacting the platform', async (): Promise<void> => {
      const error: IllegalArgumentError = await expectRejection(
        deployer.deploy(request({deploymentProperties: {'deployer.memory': 'lots'}})),
        IllegalArgumentError,
      );

      expect(error.message).to.equal(
        "Invalid value 'lots' for deployer.memory: expected a whole number optionally followed by m or g",
      );
      expect(client.store.getDetailCalls).to.equal(0);
    });

    it('pushes a container image without buildpacks', async (): Promise<void> => {
      const handle: DeploymentHandle = await deployer.deploy(
        request({resource: dockerResource('registry.example.test/time:1.0'), deploymentProperties: {}}),
      );
      await handle.completion();

      expect(handle.id).to.equal('dataflow-server-time');
      expect(client.store.pushes[0].dockerImage).to.equal('registry.example.test/time:1.0');
      expect(client.store.pushes[0].path).to.be.undefined;
      expect(client.store.pushes[0].buildpacks).to.deep.equal([]);
    });

    it('hands one environment entry per property to the application when asked to', async (): Promise<void> => {
      const handle: DeploymentHandle = await deployer.deploy(
        request({
          definition: {name: 'time', properties: {greeting: 'hi', 'server.port': '8080'}},
          deploymentProperties: {
            'deployer.cloudfoundry.use-spring-application-json': 'false',
            'deployer.count': '2',
            'deployer.cloudfoundry.domain': 'apps.example.test',
          },
          commandlineArguments: ['--trigger.fixed-delay=5', '--debug'],
        }),
      );
      await handle.completion();

      expect(client.store.pushes[0].instances).to.equal(2);
      expect(client.store.pushes[0].routes).to.deep.equal(['dataflow-server-time.apps.example.test']);
      expect(client.store.pushes[0].environmentVariables).to.deep.equal({
        greeting: 'hi',
        JBP_CONFIG_JAVA_MAIN: 'arguments: "--trigger.fixed-delay=5 --debug"',
        SPRING_CLOUD_APPLICATION_GUID: GUID,
        SPRING_APPLICATION_INDEX: INDEX,
      });
      expect(logger.messages('warn')).to.deep.equal([
        'Ignoring server.port=8080, the port is assigned by the platform',
      ]);
    });

    it('reports a failed push through the handle', async (): Promise<void> => {
      const failure: CloudFoundryApiError = new CloudFoundryApiError('staging failed', 422);
      client.store.pushFailures.push(failure);

      const handle: DeploymentHandle = await deployer.deploy(request());

      expect(await handle.outcome).to.deep.equal({status: 'failed', error: failure});
      expect(handle.phase).to.equal(DeploymentPhase.ERROR);
      expect(await expectRejection(handle.completion(), CloudFoundryApiError)).to.equal(failure);
    });
  });

  describe('undeploy', (): void => {
    it('refuses an id that is not deployed', async (): Promise<void> => {
      const error: NotDeployedError = await expectRejection(deployer.undeploy('missing'), NotDeployedError);

      expect(error.message).to.equal('App missing is not deployed');
    });

    it('deletes the application together with its routes', async (): Promise<void> => {
      client.store.addApplication('dataflow-server-time');

      const operation: AsyncOperation = await deployer.undeploy('dataflow-server-time');
      await operation.completion();

      expect(operation.description).to.equal('undeployment of dataflow-server-time');
      expect(client.store.applicationByName('dataflow-server-time')).to.be.undefined;
      expect(client.store.deletedRoutesFor).to.deep.equal(['dataflow-server-time']);
    });
  });

  describe('scale', (): void => {
    it('rejects a negative count', async (): Promise<void> => {
      await expectRejection(deployer.scale({deploymentId: 'time', count: -1}), IllegalArgumentError);

      expect(client.store.getDetailCalls).to.equal(0);
    });

    it('refuses an id that is not deployed', async (): Promise<void> => {
      await expectRejection(deployer.scale({deploymentId: 'missing', count: 2}), NotDeployedError);
    });

    it('changes the instance count and memory of a deployed application', async (): Promise<void> => {
      client.store.addApplication('time');

      const operation: AsyncOperation = await deployer.scale({deploymentId: 'time', count: 3, memory: '2g'});
      await operation.completion();

      expect(client.store.scaled).to.deep.equal([
        {name: 'time', instances: 3, memoryLimit: 2048, diskLimit: undefined},
      ]);
      expect((await deployer.status('time')).instances).to.have.lengthOf(3);
    });
  });
});
