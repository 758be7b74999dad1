import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { DeployConfig } from './executor-interface.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 120000;

const SsmTransportSchema = z.object({
  type: z.literal('ssm'),
  instanceId: z.string().min(1),
  region: z.string().min(1),
});

const SshTransportSchema = z.object({
  type: z.literal('ssh'),
  host: z.string().min(1),
  user: z.string().optional(),
  keyPath: z.string().optional(),
});

const HostTransportSchema = z.discriminatedUnion('type', [
  SsmTransportSchema,
  SshTransportSchema,
]);

const HostConfigSchema = z.object({
  name: z.string().min(1),
  transport: HostTransportSchema,
});

const DeployConfigSchema = z.object({
  framework: z.string().min(1),
  version: z.string().min(1),
  installRoot: z.string().min(1),
  templateRoot: z.string().min(1).optional(),
  hosts: z.array(HostConfigSchema).min(1),
  settings: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  executor: z.object({
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS),
  }).default({}),
});

export function parseConfig(content: string, configPath: string): DeployConfig {
  const raw: unknown = yaml.parse(content);

  const result = DeployConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config:\n${errors}`, configPath);
  }

  const names = result.data.hosts.map(h => h.name);
  const duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate !== undefined) {
    throw new ConfigError(`Invalid config:\n  hosts: duplicate host name "${duplicate}"`, configPath);
  }

  const transports = Array.from(new Set(result.data.hosts.map(h => h.transport.type)));
  if (transports.length > 1) {
    throw new ConfigError(
      `Invalid config:\n  hosts: mixed transport types (${transports.join(', ')}); all hosts must use the same transport`,
      configPath,
    );
  }

  return result.data;
}

export function loadConfig(configPath: string): DeployConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`, configPath);
  }

  return parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
}
