import type { SettingValue } from '../frameworks/types.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandExecutor {
  exec(hostName: string, command: string): Promise<CommandResult>;
  getHostNames(): string[];
  close(): Promise<void>;
}

export type HostTransport =
  | { type: 'ssm'; instanceId: string; region: string }
  | { type: 'ssh'; host: string; user?: string; keyPath?: string };

export interface HostConfig {
  name: string;
  transport: HostTransport;
}

export interface ExecutorOptions {
  commandTimeoutMs: number;
}

export interface DeployConfig {
  framework: string;
  version: string;
  installRoot: string;
  templateRoot?: string;
  // Ordered; the first host is the master
  hosts: HostConfig[];
  settings: Record<string, SettingValue>;
  executor: ExecutorOptions;
}
