import { spawn } from 'child_process';
import type { CommandResult, CommandExecutor, ExecutorOptions, HostConfig } from './executor-interface.js';

type SshTransport = Extract<HostConfig['transport'], { type: 'ssh' }>;

export function buildSshArgs(transport: SshTransport, command: string): string[] {
  const { host, user, keyPath } = transport;

  const sshArgs = [
    '-o', 'StrictHostKeyChecking=no',
    '-o', 'UserKnownHostsFile=/dev/null',
    '-o', 'BatchMode=yes',
  ];

  if (keyPath) {
    sshArgs.push('-i', keyPath);
  }

  const target = user ? `${user}@${host}` : host;
  sshArgs.push(target, command);

  return sshArgs;
}

export class SSHExecutor implements CommandExecutor {
  private hosts: Map<string, SshTransport>;

  constructor(hosts: HostConfig[], private readonly options: ExecutorOptions) {
    this.hosts = new Map();

    for (const host of hosts) {
      if (host.transport.type !== 'ssh') {
        throw new Error(`SSHExecutor only supports SSH transport, but ${host.name} uses ${host.transport.type}`);
      }
      this.hosts.set(host.name, host.transport);
    }
  }

  getHostNames(): string[] {
    return Array.from(this.hosts.keys());
  }

  async exec(hostName: string, command: string): Promise<CommandResult> {
    const transport = this.hosts.get(hostName);
    if (!transport) {
      throw new Error(`Unknown host: ${hostName}`);
    }

    return this.runSsh(buildSshArgs(transport, command));
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command SSH
  }

  private runSsh(args: string[]): Promise<CommandResult> {
    const timeoutMs = this.options.commandTimeoutMs;

    return new Promise((resolve, reject) => {
      const proc = spawn('ssh', args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        proc.kill();
        reject(new Error(`SSH command timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        clearTimeout(timeout);
        reject(err);
      });

      proc.on('close', (code) => {
        clearTimeout(timeout);
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          // code is null when ssh was killed by a signal
          exitCode: code ?? 1,
        });
      });
    });
  }
}
