// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {Flags as flags} from '../../../src/commands/flags.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {type ArgvStruct, type KeyValueMap} from '../../../src/types/aliases.js';

function argv(values: Record<string, unknown>): ArgvStruct {
  return {_: [], $0: 'cf-deployer', ...values};
}

describe('Flags', (): void => {
  describe('readKeyValues', (): void => {
    it('splits on the first equals sign only', (): void => {
      const values: KeyValueMap = flags.readKeyValues(
        argv({property: ['spring.datasource.url=jdbc:mysql://db?a=b', ' server.port =8080']}),
        flags.property,
      );

      expect(values).to.deep.equal({'spring.datasource.url': 'jdbc:mysql://db?a=b', 'server.port': '8080'});
    });

    it('accepts a single value', (): void => {
      expect(flags.readKeyValues(argv({property: 'a=1'}), flags.property)).to.deep.equal({a: '1'});
    });

    it('is empty when the option is absent', (): void => {
      expect(flags.readKeyValues(argv({}), flags.property)).to.deep.equal({});
    });

    it('rejects an entry without a key', (): void => {
      expect((): KeyValueMap => flags.readKeyValues(argv({property: ['=oops']}), flags.property)).to.throw(
        IllegalArgumentError,
        "--property expects key=value, got '=oops'",
      );
    });
  });

  describe('readRequiredString', (): void => {
    it('returns the value', (): void => {
      expect(flags.readRequiredString(argv({name: 'log'}), flags.definitionName)).to.equal('log');
    });

    it('rejects a blank value', (): void => {
      expect((): string => flags.readRequiredString(argv({name: '  '}), flags.definitionName)).to.throw(
        IllegalArgumentError,
        '--name is required',
      );
    });
  });

  describe('readNumber', (): void => {
    it('parses whole numbers', (): void => {
      expect(flags.readNumber(argv({count: '3'}), flags.count)).to.equal(3);
      expect(flags.readNumber(argv({}), flags.count)).to.be.undefined;
    });

    it('rejects fractions', (): void => {
      expect((): number | undefined => flags.readNumber(argv({count: 1.5}), flags.count)).to.throw(
        IllegalArgumentError,
        '--count must be a whole number, got 1.5',
      );
    });
  });

  it('reads lists and booleans', (): void => {
    expect(flags.readList(argv({arg: ['--a', 2]}), flags.argument)).to.deep.equal(['--a', '2']);
    expect(flags.readBoolean(argv({wait: true}), flags.wait)).to.be.true;
    expect(flags.readBoolean(argv({wait: 'true'}), flags.wait)).to.be.false;
  });
});
