import { describe, it, beforeEach, afterEach } from 'mocha';
import { expect } from 'chai';
import { mkdtemp, mkdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runDeploy } from '../../../src/actions/deploy.js';
import { createFrameworkRegistry } from '../../../src/frameworks/index.js';
import { ExecutorShell } from '../../../src/runner/remote-shell.js';
import type { DeployConfig } from '../../../src/runner/executor-interface.js';
import { UnknownFrameworkError, UnknownVersionError } from '../../../src/errors.js';
import { createConsoleLog, silentLog } from '../../../src/logger.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';
import { captureRejection } from '../../helpers/rejection.js';

describe('Deploy action', () => {
  let installRoot: string;

  beforeEach(async () => {
    installRoot = await mkdtemp(join(tmpdir(), 'deployer-action-test-'));
    await mkdir(join(installRoot, 'etc', 'hadoop'), { recursive: true });
  });

  afterEach(async () => {
    await rm(installRoot, { recursive: true, force: true });
  });

  function config(overrides: Partial<DeployConfig> = {}): DeployConfig {
    return {
      framework: 'hadoop',
      version: '2.6.0',
      installRoot,
      hosts: [
        { name: 'm0', transport: { type: 'ssh', host: '10.0.0.1' } },
        { name: 'w0', transport: { type: 'ssh', host: '10.0.0.2' } },
        { name: 'w1', transport: { type: 'ssh', host: '10.0.0.3' } },
      ],
      settings: { java_home: '/usr/lib/jvm/x' },
      executor: { commandTimeoutMs: 1000 },
      ...overrides,
    };
  }

  it('should deploy onto the configured hosts with the first as master', async () => {
    const executor = new FakeExecutor(['m0', 'w0', 'w1']);
    const registry = createFrameworkRegistry({ hadoop: { user: 'tester' } });

    await runDeploy(new ExecutorShell(executor), config(), { log: silentLog, registry });

    expect(await readFile(join(installRoot, 'etc', 'hadoop', 'masters'), 'utf-8')).to.equal('m0\n');
    expect(await readFile(join(installRoot, 'etc', 'hadoop', 'slaves'), 'utf-8')).to.equal('w0\nw1\n');
    expect(executor.executed.at(-1)).to.deep.equal({ host: 'm0', command: `"${installRoot}/sbin/start-yarn.sh"` });
  });

  it('should fail on an unknown framework or version', async () => {
    const shell = new ExecutorShell(new FakeExecutor(['m0', 'w0', 'w1']));

    expect(await captureRejection(runDeploy(shell, config({ framework: 'spark' }), { log: silentLog })))
      .to.be.instanceOf(UnknownFrameworkError);
    expect(await captureRejection(runDeploy(shell, config({ version: '3.0.0' }), { log: silentLog })))
      .to.be.instanceOf(UnknownVersionError);
  });

  it('should indent console narration by level', async () => {
    const lines: string[] = [];
    const log = createConsoleLog(line => lines.push(line));
    const registry = createFrameworkRegistry({ hadoop: { user: 'tester' } });

    await runDeploy(new ExecutorShell(new FakeExecutor(['m0', 'w0', 'w1'])), config(), { log, registry });

    expect(lines[0]).to.equal('Selected Hadoop master "m0", with 2 workers.');
    expect(lines[1]).to.equal('  Generating configuration files...');
    expect(lines[2]).to.equal('    Generating file "core-site.xml"...');
    expect(lines.at(-1)).to.equal('  Hadoop cluster deployed.');
  });
});
