import type { DeployConfig } from '../runner/executor-interface.js';
import type { RemoteShell } from '../runner/remote-shell.js';

export interface CheckResult {
  name: string;
  host?: string;
  passed: boolean;
  message: string;
  durationMs: number;
}

export interface CheckContext {
  config: DeployConfig;
  shell: RemoteShell;
}

export interface Check {
  name: string;
  description: string;

  // Run the check and return results.
  // May return multiple results (e.g., one per host).
  run(ctx: CheckContext): Promise<CheckResult[]>;
}
