import { RemoteCommandError } from '../errors.js';
import { debugEnabled } from '../logger.js';
import type { CommandExecutor, CommandResult } from './executor-interface.js';

// Runs a command on a host and raises if it does not exit cleanly.
export interface RemoteShell {
  run(host: string, command: string): Promise<CommandResult>;
}

export class ExecutorShell implements RemoteShell {
  constructor(private readonly executor: CommandExecutor) {}

  hosts(): string[] {
    return this.executor.getHostNames();
  }

  async run(host: string, command: string): Promise<CommandResult> {
    if (debugEnabled()) {
      console.error(`[DEBUG] ${host}: ${command}`);
    }

    let result: CommandResult;
    try {
      result = await this.executor.exec(host, command);
    } catch (err) {
      throw new RemoteCommandError(host, command, null, err instanceof Error ? err.message : String(err));
    }

    if (result.exitCode !== 0) {
      throw new RemoteCommandError(host, command, result.exitCode, result.stderr);
    }
    return result;
  }
}
