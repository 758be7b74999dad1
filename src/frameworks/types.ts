import type { LogFn } from '../logger.js';
import type { RemoteShell } from '../runner/remote-shell.js';

export type SettingValue = string | number | boolean;

export type DeploymentSettings = Readonly<Record<string, SettingValue>>;

export interface FrameworkVersion {
  readonly version: string;
  readonly archiveUrl: string;
  readonly archiveExtension: string;
  // Top-level directory inside the extracted archive
  readonly archiveRootDir: string;
}

export interface DeploymentSetting {
  readonly name: string;
  readonly description: string;
}

export interface DeployRequest {
  installRoot: string;
  // First machine is the master, the rest are workers
  machines: readonly string[];
  settings: DeploymentSettings;
}

export interface DeployContext {
  shell: RemoteShell;
  log: LogFn;
}

export interface Deployable<V extends FrameworkVersion> {
  readonly minimumMachines: number;
  supportedSettings(version: V): readonly DeploymentSetting[];
  deploy(version: V, request: DeployRequest, context: DeployContext): Promise<void>;
}
