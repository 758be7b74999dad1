import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  parseBooleanSetting,
  parsePositiveIntSetting,
  SettingsClaim,
} from '../../../src/frameworks/settings.js';
import { UnsupportedSettingError } from '../../../src/errors.js';
import { captureThrow, narrow } from '../../helpers/rejection.js';

describe('Deployment settings', () => {
  describe('parseBooleanSetting', () => {
    it('should accept the truthy words in any case', () => {
      for (const value of ['True', 'YES', '1', 't', 'Y', 'true']) {
        expect(parseBooleanSetting(value), value).to.equal(true);
      }
    });

    it('should treat false-like and empty values as false', () => {
      for (const value of ['false', '0', '', 'no']) {
        expect(parseBooleanSetting(value), value).to.equal(false);
      }
    });

    it('should treat unrecognised words as false', () => {
      expect(parseBooleanSetting('banana')).to.equal(false);
    });

    it('should handle boolean and numeric values', () => {
      expect(parseBooleanSetting(true)).to.equal(true);
      expect(parseBooleanSetting(false)).to.equal(false);
      expect(parseBooleanSetting(1)).to.equal(true);
      expect(parseBooleanSetting(0)).to.equal(false);
    });
  });

  describe('parsePositiveIntSetting', () => {
    it('should accept numbers and digit strings', () => {
      expect(parsePositiveIntSetting('yarn_memory_mb', 2048)).to.equal(2048);
      expect(parsePositiveIntSetting('yarn_memory_mb', ' 8192 ')).to.equal(8192);
    });

    it('should reject zero, negatives, fractions and words', () => {
      for (const value of [0, -5, 1.5, 'lots', '', true]) {
        const err = captureThrow(() => parsePositiveIntSetting('yarn_memory_mb', value));
        const settingError = narrow(err, UnsupportedSettingError);
        expect(settingError.reason).to.equal('invalid');
        expect(settingError.keys).to.deep.equal(['yarn_memory_mb']);
      }
    });
  });

  describe('SettingsClaim', () => {
    it('should return the supplied value or the default', () => {
      const claim = new SettingsClaim('Test', { a: 'x' });

      expect(claim.claim('a', 'default')).to.equal('x');
      expect(claim.claim('b', 42)).to.equal(42);
    });

    it('should not mutate the input settings', () => {
      const settings = { a: 'x', b: 2 };
      const claim = new SettingsClaim('Test', settings);

      claim.claim('a', '');
      claim.require('b');

      expect(settings).to.deep.equal({ a: 'x', b: 2 });
    });

    it('should fail on a missing required setting', () => {
      const claim = new SettingsClaim('Test', {});

      const err = narrow(captureThrow(() => claim.require('java_home')), UnsupportedSettingError);

      expect(err.reason).to.equal('missing');
      expect(err.keys).to.deep.equal(['java_home']);
      expect(err.message).to.equal("Missing required setting for Test: 'java_home'");
    });

    it('should list exactly the unclaimed keys', () => {
      const claim = new SettingsClaim('Test', { known: 1, extra: 'a', other: true });
      claim.claim('known', 0);

      const err = narrow(captureThrow(() => claim.assertFullyClaimed()), UnsupportedSettingError);

      expect(err.reason).to.equal('unknown');
      expect(err.keys).to.deep.equal(['extra', 'other']);
      expect(err.message).to.equal("Found unknown settings for Test: 'extra','other'");
    });

    it('should pass once every key has been claimed', () => {
      const claim = new SettingsClaim('Test', { a: 1 });
      claim.claim('a', 0);

      expect(() => claim.assertFullyClaimed()).to.not.throw();
    });

    it('should count a claimed key even when it fell back to the default', () => {
      const claim = new SettingsClaim('Test', {});
      claim.claim('optional', 'x');

      expect(claim.unclaimed()).to.deep.equal([]);
    });
  });
});
