import { createHadoopFramework, type HadoopDeployerOptions } from './hadoop.js';
import { FrameworkRegistry } from './registry.js';

export interface RegistryOptions {
  hadoop?: HadoopDeployerOptions;
}

// Startup routine: every built-in framework is registered here before any deployment runs.
export function createFrameworkRegistry(options: RegistryOptions = {}): FrameworkRegistry {
  const registry = new FrameworkRegistry();
  registry.registerFramework(createHadoopFramework(options.hadoop));
  return registry;
}

export { Framework } from './framework.js';
export { FrameworkRegistry } from './registry.js';
export { HadoopDeployer, createHadoopFramework } from './hadoop.js';
export type { HadoopVersion, HadoopDeployerOptions } from './hadoop.js';
export type {
  Deployable,
  DeployContext,
  DeployRequest,
  DeploymentSetting,
  DeploymentSettings,
  FrameworkVersion,
  SettingValue,
} from './types.js';
