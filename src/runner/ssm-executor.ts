import {
  SSMClient,
  SendCommandCommand,
  GetCommandInvocationCommand,
  type SendCommandCommandInput,
  type SendCommandCommandOutput,
  type GetCommandInvocationCommandInput,
  type GetCommandInvocationCommandOutput,
} from '@aws-sdk/client-ssm';
import type { CommandResult, CommandExecutor, ExecutorOptions, HostConfig } from './executor-interface.js';

const DEFAULT_POLL_INTERVAL_MS = 1000;
const PENDING_STATUSES = new Set(['Pending', 'InProgress', 'Delayed', 'Cancelling']);

type SsmTransport = Extract<HostConfig['transport'], { type: 'ssm' }>;

// The two SSM calls used here, so tests can stand in for the AWS client.
export interface SsmApi {
  sendCommand(input: SendCommandCommandInput): Promise<SendCommandCommandOutput>;
  getCommandInvocation(input: GetCommandInvocationCommandInput): Promise<GetCommandInvocationCommandOutput>;
}

export function createSsmApi(region: string): SsmApi {
  const client = new SSMClient({ region });
  return {
    sendCommand: input => client.send(new SendCommandCommand(input)),
    getCommandInvocation: input => client.send(new GetCommandInvocationCommand(input)),
  };
}

export interface SSMExecutorOptions extends ExecutorOptions {
  pollIntervalMs?: number;
  createApi?: (region: string) => SsmApi;
}

interface SsmTarget {
  transport: SsmTransport;
  api: SsmApi;
}

function isInvocationNotReady(err: unknown): boolean {
  return err instanceof Error && err.name === 'InvocationDoesNotExist';
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// SSM Run Command (AWS-RunShellScript), polled until the invocation reaches a terminal status.
export class SSMExecutor implements CommandExecutor {
  private targets: Map<string, SsmTarget>;
  private pollIntervalMs: number;

  constructor(hosts: HostConfig[], private readonly options: SSMExecutorOptions) {
    this.targets = new Map();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const createApi = options.createApi ?? createSsmApi;

    // Group hosts by region to share SSM clients
    const apisByRegion = new Map<string, SsmApi>();

    for (const host of hosts) {
      if (host.transport.type !== 'ssm') {
        throw new Error(`SSMExecutor only supports SSM transport, but ${host.name} uses ${host.transport.type}`);
      }

      const { region } = host.transport;
      let api = apisByRegion.get(region);
      if (!api) {
        api = createApi(region);
        apisByRegion.set(region, api);
      }

      this.targets.set(host.name, { transport: host.transport, api });
    }
  }

  getHostNames(): string[] {
    return Array.from(this.targets.keys());
  }

  async exec(hostName: string, command: string): Promise<CommandResult> {
    const target = this.targets.get(hostName);
    if (!target) {
      throw new Error(`Unknown host: ${hostName}`);
    }

    const { instanceId } = target.transport;
    const sent = await target.api.sendCommand({
      InstanceIds: [instanceId],
      DocumentName: 'AWS-RunShellScript',
      Parameters: { commands: [command] },
    });

    const commandId = sent.Command?.CommandId;
    if (!commandId) {
      throw new Error(`Failed to send command to ${hostName}: missing command id`);
    }

    return this.waitForInvocation(target.api, commandId, instanceId);
  }

  async close(): Promise<void> {
    // Run Command keeps no session open
  }

  private async waitForInvocation(api: SsmApi, commandId: string, instanceId: string): Promise<CommandResult> {
    const deadline = Date.now() + this.options.commandTimeoutMs;

    while (Date.now() < deadline) {
      await sleep(this.pollIntervalMs);

      let invocation: GetCommandInvocationCommandOutput;
      try {
        invocation = await api.getCommandInvocation({ CommandId: commandId, InstanceId: instanceId });
      } catch (err) {
        // Invocation is not visible for a short while after SendCommand
        if (isInvocationNotReady(err)) continue;
        throw err;
      }

      if (invocation.Status && PENDING_STATUSES.has(invocation.Status)) {
        continue;
      }

      const responseCode = invocation.ResponseCode ?? -1;
      return {
        stdout: (invocation.StandardOutputContent ?? '').trim(),
        stderr: (invocation.StandardErrorContent ?? '').trim(),
        exitCode: invocation.Status === 'Success' ? 0 : responseCode === 0 ? 1 : responseCode,
      };
    }

    throw new Error(`SSM command ${commandId} timed out after ${this.options.commandTimeoutMs}ms`);
  }
}
