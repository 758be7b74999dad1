import { deployCluster } from '../deploy.js';
import { createFrameworkRegistry } from '../frameworks/index.js';
import type { FrameworkRegistry } from '../frameworks/registry.js';
import type { LogFn } from '../logger.js';
import type { DeployConfig } from '../runner/executor-interface.js';
import type { RemoteShell } from '../runner/remote-shell.js';

export interface DeployActionOptions {
  log: LogFn;
  registry?: FrameworkRegistry;
}

// Deploys the framework named in the config onto its hosts, in the order they are listed.
export async function runDeploy(
  shell: RemoteShell,
  config: DeployConfig,
  options: DeployActionOptions
): Promise<void> {
  const registry = options.registry ?? createFrameworkRegistry({
    hadoop: { templateRoot: config.templateRoot },
  });

  await deployCluster(
    registry,
    {
      framework: config.framework,
      version: config.version,
      installRoot: config.installRoot,
      machines: config.hosts.map(h => h.name),
      settings: config.settings,
    },
    { shell, log: options.log }
  );
}
