// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {StringEx} from '../../../../src/business/utils/string-ex.js';

describe('StringEx', (): void => {
  describe('isEmpty', (): void => {
    it('should return true for empty and blank strings', (): void => {
      expect(StringEx.isEmpty('')).to.be.true;
      expect(StringEx.isEmpty('   ')).to.be.true;
      expect(StringEx.isEmpty(undefined)).to.be.true;
    });

    it('should return false for non-empty strings', (): void => {
      expect(StringEx.isEmpty('hello')).to.be.false;
    });
  });

  describe('camelCaseToSnake', (): void => {
    it('should split words at capitals', (): void => {
      expect(StringEx.camelCaseToSnake('listTimeoutSeconds')).to.equal('list_timeout_seconds');
    });

    it('should keep runs of capitals together', (): void => {
      expect(StringEx.camelCaseToSnake('apiURL')).to.equal('api_url');
      expect(StringEx.camelCaseToSnake('skipSSLValidation')).to.equal('skip_ssl_validation');
    });

    it('should leave dotted paths intact', (): void => {
      expect(StringEx.camelCaseToSnake('scheduler.scheduleSslRetryCount')).to.equal(
        'scheduler.schedule_ssl_retry_count',
      );
    });
  });

  describe('splitList', (): void => {
    it('should trim items and drop empty ones', (): void => {
      expect(StringEx.splitList(' a, b ,, c ')).to.deep.equal(['a', 'b', 'c']);
    });

    it('should return an empty list for missing input', (): void => {
      expect(StringEx.splitList(undefined)).to.deep.equal([]);
      expect(StringEx.splitList(' ')).to.deep.equal([]);
    });
  });
});
