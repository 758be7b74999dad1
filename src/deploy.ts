import type { FrameworkRegistry } from './frameworks/registry.js';
import type { DeployContext, DeploymentSettings } from './frameworks/types.js';

export interface ClusterDeployment {
  framework: string;
  version: string;
  installRoot: string;
  machines: readonly string[];
  settings: DeploymentSettings;
}

// Any failure aborts the run; steps already applied on the hosts are not undone.
export async function deployCluster(
  registry: FrameworkRegistry,
  deployment: ClusterDeployment,
  context: DeployContext,
): Promise<void> {
  const framework = registry.framework(deployment.framework);
  await framework.deploy(
    deployment.version,
    {
      installRoot: deployment.installRoot,
      machines: deployment.machines,
      settings: deployment.settings,
    },
    context,
  );
}
