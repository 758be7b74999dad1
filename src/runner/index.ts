#!/usr/bin/env node

import { parseArgs } from 'util';
import { loadConfig } from './config.js';
import { createExecutor } from './executor-factory.js';
import { ExecutorShell } from './remote-shell.js';
import type { CommandExecutor, DeployConfig } from './executor-interface.js';
import { runPreflight } from '../checks/index.js';
import { runDeploy } from '../actions/deploy.js';
import { createFrameworkRegistry } from '../frameworks/index.js';
import { createConsoleLog } from '../logger.js';

interface RunnerContext {
  config: DeployConfig;
  executor: CommandExecutor;
  shell: ExecutorShell;
}

function initRunnerContext(configPath: string): RunnerContext {
  const config = loadConfig(configPath);
  const executor = createExecutor(config.hosts, config.executor);

  return { config, executor, shell: new ExecutorShell(executor) };
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'deploy.yaml' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: cluster-deployer [options] [command]

Options:
  -c, --config <path>       Path to deployment config file (default: deploy.yaml)
  -h, --help                Show this help message

Commands:
  frameworks                List known frameworks and their versions
  settings <fw> <version>   List the deployment settings a framework version accepts
  check                     Verify connectivity to all hosts
  exec <command>            Execute a command on all hosts, one after another
  preflight                 Run pre-deployment checks
  deploy                    Deploy the configured framework onto the hosts

Examples:
  cluster-deployer frameworks
  cluster-deployer settings hadoop 2.6.0
  cluster-deployer --config cluster.yaml preflight
  cluster-deployer --config cluster.yaml deploy
`);
    process.exit(0);
  }

  const configPath = values.config || 'deploy.yaml';
  const [command, ...args] = positionals;

  // Commands that only read the framework catalog need no config or hosts
  switch (command) {
    case 'frameworks':
      listFrameworks();
      return;

    case 'settings':
      if (args.length < 2) {
        console.error('Error: settings requires a framework and a version');
        process.exit(1);
      }
      listSettings(args[0], args[1]);
      return;
  }

  const context = initRunnerContext(configPath);

  try {
    switch (command) {
      case 'check':
        await checkConnectivity(context);
        break;

      case 'exec':
        if (args.length === 0) {
          console.error('Error: exec requires a command argument');
          process.exit(1);
        }
        await execOnAll(context, args.join(' '));
        break;

      case 'preflight':
        await preflight(context);
        break;

      case 'deploy':
        await runDeploy(context.shell, context.config, { log: createConsoleLog() });
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error('Run with --help for usage information');
        process.exit(1);
    }
  } finally {
    await context.executor.close();
  }
}

function listFrameworks(): void {
  for (const framework of createFrameworkRegistry().frameworks()) {
    const versions = framework.listVersions().map(v => v.version).join(', ');
    console.log(`${framework.id} (${framework.displayName}, min ${framework.minimumMachines} machines): ${versions}`);
  }
}

function listSettings(frameworkId: string, version: string): void {
  const framework = createFrameworkRegistry().framework(frameworkId);
  console.log(`Settings for ${framework.displayName} ${version}:`);
  for (const setting of framework.getSupportedDeploymentSettings(version)) {
    console.log(`  ${setting.name}: ${setting.description}`);
  }
}

async function checkConnectivity(context: RunnerContext): Promise<void> {
  console.log('Checking connectivity to all hosts...\n');

  let allOk = true;
  for (const hostName of context.shell.hosts()) {
    const result = await context.executor.exec(hostName, 'echo "ok"');
    const ok = result.exitCode === 0 && result.stdout.includes('ok');
    if (!ok) allOk = false;
    console.log(`  ${ok ? '✓' : '✗'} ${hostName}: ${ok ? 'connected' : `failed (exit ${result.exitCode})`}`);
    if (result.stderr) {
      console.log(`    stderr: ${result.stderr}`);
    }
  }

  console.log('');
  if (allOk) {
    console.log('All hosts reachable.');
  } else {
    console.log('Some hosts failed connectivity check.');
    process.exit(1);
  }
}

async function execOnAll(context: RunnerContext, command: string): Promise<void> {
  console.log(`Executing on all hosts: ${command}\n`);

  for (const hostName of context.shell.hosts()) {
    const result = await context.executor.exec(hostName, command);
    console.log(`--- ${hostName} (exit ${result.exitCode}) ---`);
    if (result.stdout) console.log(result.stdout);
    if (result.stderr) console.log(`stderr: ${result.stderr}`);
    console.log('');
  }
}

async function preflight(context: RunnerContext): Promise<void> {
  console.log('Running preflight checks...\n');

  const { passed, failed } = await runPreflight(
    { config: context.config, shell: context.shell },
    {
      onResult: (result) => {
        const icon = result.passed ? '✓' : '✗';
        const hostInfo = result.host ? ` [${result.host}]` : '';
        console.log(`  ${icon} ${result.name}${hostInfo}: ${result.message} (${result.durationMs}ms)`);
      },
    }
  );

  console.log(`\n${passed} passed, ${failed} failed`);

  if (failed > 0) {
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
