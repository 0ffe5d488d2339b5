// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {EnvironmentVariablesBuilder} from '../../../../src/business/deployment/environment-variables-builder.js';
import {TestLogger} from '../../../helpers/test-logger.js';

describe('EnvironmentVariablesBuilder', (): void => {
  let logger: TestLogger;
  let builder: EnvironmentVariablesBuilder;

  beforeEach((): void => {
    logger = new TestLogger();
    builder = new EnvironmentVariablesBuilder(logger);
  });

  describe('forProperties', (): void => {
    it('returns nothing for no properties', (): void => {
      expect(builder.forProperties({}, true)).to.deep.equal({});
    });

    it('serializes every property into SPRING_APPLICATION_JSON', (): void => {
      expect(builder.forProperties({'server.port': '8080', greeting: 'hi'}, true)).to.deep.equal({
        SPRING_APPLICATION_JSON: '{"server.port":"8080","greeting":"hi"}',
      });
    });

    it('copies properties one by one without server.port', (): void => {
      expect(builder.forProperties({'server.port': '8080', greeting: 'hi'}, false)).to.deep.equal({greeting: 'hi'});
      expect(logger.messages('warn')).to.have.lengthOf(1);
    });
  });

  describe('forApplication', (): void => {
    it('adds the identity of the instance', (): void => {
      expect(
        builder.forApplication({properties: {}, commandlineArguments: [], useSpringApplicationJson: true}),
      ).to.deep.equal({
        SPRING_CLOUD_APPLICATION_GUID: '${vcap.application.name}:${vcap.application.instance_index}',
        SPRING_APPLICATION_INDEX: '${vcap.application.instance_index}',
      });
    });

    it('adds the group and the command line arguments', (): void => {
      const environment: Record<string, string> = builder.forApplication({
        properties: {},
        commandlineArguments: ['--name=world'],
        group: 'ticktock',
        useSpringApplicationJson: true,
      });

      expect(environment.SPRING_CLOUD_APPLICATION_GROUP).to.equal('ticktock');
      expect(environment.JBP_CONFIG_JAVA_MAIN).to.equal('arguments: "--name=world"');
    });
  });
});
