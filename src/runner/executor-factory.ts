import type { CommandExecutor, ExecutorOptions, HostConfig } from './executor-interface.js';
import { SSMExecutor } from './ssm-executor.js';
import { SSHExecutor } from './ssh-executor.js';

export function createExecutor(hosts: HostConfig[], options: ExecutorOptions): CommandExecutor {
  if (hosts.length === 0) {
    throw new Error('No hosts provided');
  }

  const transportTypes = new Set(hosts.map(h => h.transport.type));

  if (transportTypes.size > 1) {
    throw new Error(
      `Mixed transport types not supported. Found: ${Array.from(transportTypes).join(', ')}. ` +
      `All hosts must use the same transport type.`
    );
  }

  const transportType = hosts[0].transport.type;

  switch (transportType) {
    case 'ssm':
      return new SSMExecutor(hosts, options);
    case 'ssh':
      return new SSHExecutor(hosts, options);
  }
}
