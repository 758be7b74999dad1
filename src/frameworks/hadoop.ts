import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { InvalidTopologyError } from '../errors.js';
import { LogLevel } from '../logger.js';
import { renderTemplates } from '../templates/renderer.js';
import { Framework } from './framework.js';
import { parseBooleanSetting, parsePositiveIntSetting, SettingsClaim } from './settings.js';
import type {
  Deployable,
  DeployContext,
  DeployRequest,
  DeploymentSetting,
  FrameworkVersion,
} from './types.js';

export const SETTING_JAVA_HOME = 'java_home';
export const SETTING_YARN_MB = 'yarn_memory_mb';
export const SETTING_LOG_AGGREGATION = 'log_aggregation';

const ALL_SETTINGS: readonly DeploymentSetting[] = [
  { name: SETTING_JAVA_HOME, description: 'value of JAVA_HOME to deploy Hadoop with' },
  { name: SETTING_YARN_MB, description: 'memory available per node to YARN in MB' },
  { name: SETTING_LOG_AGGREGATION, description: 'enable YARN log aggregation' },
];

const DEFAULT_YARN_MB = 4096;
const DEFAULT_LOG_AGGREGATION = false;
const DEFAULT_SCRATCH_ROOT = '/local';

export const DEFAULT_TEMPLATE_ROOT = fileURLToPath(new URL('../../conf', import.meta.url));

export interface HadoopVersion extends FrameworkVersion {
  // Template set under <templateRoot>/hadoop/
  readonly templateDir: string;
}

export interface HadoopDeployerOptions {
  templateRoot?: string;
  user?: string;
  // Parent of the per-user scratch directory on every node
  scratchRoot?: string;
}

function currentUser(): string {
  return process.env.USER || os.userInfo().username;
}

function findDuplicates(machines: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const machine of machines) {
    if (seen.has(machine)) {
      duplicates.add(machine);
    }
    seen.add(machine);
  }
  return Array.from(duplicates);
}

export class HadoopDeployer implements Deployable<HadoopVersion> {
  readonly minimumMachines = 2;

  private readonly templateRoot: string;
  private readonly userOverride: string | undefined;
  private readonly scratchRoot: string;

  constructor(options: HadoopDeployerOptions = {}) {
    this.templateRoot = options.templateRoot ?? DEFAULT_TEMPLATE_ROOT;
    this.userOverride = options.user;
    this.scratchRoot = options.scratchRoot ?? DEFAULT_SCRATCH_ROOT;
  }

  supportedSettings(_version: HadoopVersion): readonly DeploymentSetting[] {
    return ALL_SETTINGS;
  }

  async deploy(version: HadoopVersion, request: DeployRequest, context: DeployContext): Promise<void> {
    const { machines } = request;
    const { shell, log } = context;

    if (machines.length < this.minimumMachines) {
      throw new InvalidTopologyError(
        'Hadoop requires at least two machines: a master and at least one worker.',
        machines,
      );
    }
    const duplicates = findDuplicates(machines);
    if (duplicates.length > 0) {
      throw new InvalidTopologyError(`Machines listed more than once: ${duplicates.join(', ')}`, machines);
    }

    const [master, ...workers] = machines;
    log(LogLevel.Phase, `Selected Hadoop master "${master}", with ${workers.length} workers.`);

    const hadoopHome = path.resolve(request.installRoot);
    const user = this.userOverride ?? currentUser();

    const claim = new SettingsClaim('Hadoop', request.settings);
    const yarnMb = parsePositiveIntSetting(SETTING_YARN_MB, claim.claim(SETTING_YARN_MB, DEFAULT_YARN_MB));
    const javaHome = String(claim.require(SETTING_JAVA_HOME));
    const logAggregation = parseBooleanSetting(claim.claim(SETTING_LOG_AGGREGATION, DEFAULT_LOG_AGGREGATION));
    claim.assertFullyClaimed();

    const substitutions = new Map<string, string>([
      ['__USER__', user],
      ['__MASTER__', master],
      ['__YARN_MB__', String(yarnMb)],
      ['__LOG_AGGREGATION__', logAggregation ? 'true' : 'false'],
    ]);
    if (javaHome) {
      substitutions.set('${JAVA_HOME}', javaHome);
    }

    log(LogLevel.Step, 'Generating configuration files...');
    renderTemplates({
      templateDir: path.join(this.templateRoot, 'hadoop', version.templateDir),
      outputDir: path.join(hadoopHome, 'etc', 'hadoop'),
      substitutions,
      master,
      workers,
      log,
    });
    log(LogLevel.Detail, 'Configuration files generated.');

    log(LogLevel.Step, 'Creating a clean environment on the master and workers...');
    const scratchDir = `${this.scratchRoot}/${user}/hadoop`;
    log(LogLevel.Detail, `Purging "${scratchDir}" on master...`);
    await shell.run(master, `rm -rf "${scratchDir}"`);
    log(LogLevel.Detail, `Purging "${scratchDir}" on workers...`);
    for (const worker of workers) {
      await shell.run(worker, `rm -rf "${scratchDir}"`);
    }
    log(LogLevel.Detail, 'Creating directory structure on master...');
    await shell.run(master, `mkdir -p "${scratchDir}"`);
    log(LogLevel.Detail, 'Creating directory structure on workers...');
    for (const worker of workers) {
      await shell.run(worker, `mkdir -p "${scratchDir}/tmp" "${scratchDir}/datanode"`);
    }
    log(LogLevel.Detail, 'Clean environment set up.');

    log(LogLevel.Step, 'Deploying HDFS...');
    log(LogLevel.Detail, 'Formatting namenode...');
    await shell.run(master, `"${hadoopHome}/bin/hadoop" namenode -format`);
    log(LogLevel.Detail, 'Starting HDFS...');
    await shell.run(master, `"${hadoopHome}/sbin/start-dfs.sh"`);

    log(LogLevel.Step, 'Deploying YARN...');
    await shell.run(master, `"${hadoopHome}/sbin/start-yarn.sh"`);

    log(LogLevel.Step, 'Hadoop cluster deployed.');
  }
}

export function createHadoopFramework(options: HadoopDeployerOptions = {}): Framework<HadoopVersion> {
  return new Framework<HadoopVersion>('hadoop', 'Hadoop', new HadoopDeployer(options))
    .addVersion({
      version: '2.6.0',
      archiveUrl: 'https://archive.apache.org/dist/hadoop/core/hadoop-2.6.0/hadoop-2.6.0.tar.gz',
      archiveExtension: 'tar.gz',
      archiveRootDir: 'hadoop-2.6.0',
      templateDir: '2.6.x',
    });
}
