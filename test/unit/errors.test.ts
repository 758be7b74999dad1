import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  DeployError,
  DeployErrorCode,
  InvalidTopologyError,
  TemplateIOError,
  UnsupportedSettingError,
} from '../../src/errors.js';

describe('DeployError', () => {
  it('should carry a code and context', () => {
    const err = new InvalidTopologyError('too few machines', ['m0']);

    expect(err).to.be.instanceOf(DeployError);
    expect(err).to.be.instanceOf(Error);
    expect(err.code).to.equal(DeployErrorCode.INVALID_TOPOLOGY);
    expect(err.name).to.equal('InvalidTopologyError');
    expect(err.context).to.deep.equal({ machines: ['m0'] });
  });

  it('should record the offending setting keys', () => {
    const err = new UnsupportedSettingError('unknown settings', ['a', 'b'], 'unknown');

    expect(err.code).to.equal(DeployErrorCode.UNSUPPORTED_SETTING);
    expect(err.context).to.deep.equal({ keys: ['a', 'b'], reason: 'unknown' });
  });

  it('should keep the message of the underlying IO error', () => {
    const err = new TemplateIOError('Cannot write /x/y', '/x/y', new Error('ENOENT: no such file or directory'));

    expect(err.context).to.deep.equal({ path: '/x/y', cause: 'ENOENT: no such file or directory' });
  });
});
