export enum DeployErrorCode {
  INVALID_TOPOLOGY = 'INVALID_TOPOLOGY',
  UNSUPPORTED_SETTING = 'UNSUPPORTED_SETTING',
  TEMPLATE_IO = 'TEMPLATE_IO',
  REMOTE_COMMAND = 'REMOTE_COMMAND',
  DUPLICATE_FRAMEWORK = 'DUPLICATE_FRAMEWORK',
  DUPLICATE_VERSION = 'DUPLICATE_VERSION',
  UNKNOWN_FRAMEWORK = 'UNKNOWN_FRAMEWORK',
  UNKNOWN_VERSION = 'UNKNOWN_VERSION',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DeployErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    this.context = context;
  }
}

export class InvalidTopologyError extends DeployError {
  constructor(message: string, readonly machines: readonly string[]) {
    super(DeployErrorCode.INVALID_TOPOLOGY, message, { machines });
    this.name = 'InvalidTopologyError';
  }
}

export type UnsupportedSettingReason = 'unknown' | 'missing' | 'invalid';

export class UnsupportedSettingError extends DeployError {
  constructor(
    message: string,
    readonly keys: readonly string[],
    readonly reason: UnsupportedSettingReason,
  ) {
    super(DeployErrorCode.UNSUPPORTED_SETTING, message, { keys, reason });
    this.name = 'UnsupportedSettingError';
  }
}

export class TemplateIOError extends DeployError {
  constructor(message: string, readonly path: string, cause?: unknown) {
    super(DeployErrorCode.TEMPLATE_IO, message, {
      path,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'TemplateIOError';
  }
}

export class RemoteCommandError extends DeployError {
  constructor(
    readonly host: string,
    readonly command: string,
    // null when the command never produced an exit status (connection failure, timeout)
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(
      DeployErrorCode.REMOTE_COMMAND,
      `Command on ${host} ${exitCode === null ? 'could not be run' : `exited with status ${exitCode}`}: ` +
        `${command}${stderr ? `\n${stderr}` : ''}`,
      { host, command, exitCode },
    );
    this.name = 'RemoteCommandError';
  }
}

export class DuplicateFrameworkError extends DeployError {
  constructor(readonly frameworkId: string) {
    super(DeployErrorCode.DUPLICATE_FRAMEWORK, `Framework "${frameworkId}" is already registered`);
    this.name = 'DuplicateFrameworkError';
  }
}

export class UnknownFrameworkError extends DeployError {
  constructor(readonly frameworkId: string) {
    super(DeployErrorCode.UNKNOWN_FRAMEWORK, `Unknown framework: ${frameworkId}`);
    this.name = 'UnknownFrameworkError';
  }
}

export class DuplicateVersionError extends DeployError {
  constructor(readonly frameworkId: string, readonly version: string) {
    super(
      DeployErrorCode.DUPLICATE_VERSION,
      `Version "${version}" is already registered for framework "${frameworkId}"`,
    );
    this.name = 'DuplicateVersionError';
  }
}

export class UnknownVersionError extends DeployError {
  constructor(readonly frameworkId: string, readonly version: string) {
    super(DeployErrorCode.UNKNOWN_VERSION, `Unknown version of ${frameworkId}: ${version}`);
    this.name = 'UnknownVersionError';
  }
}

export class ConfigError extends DeployError {
  constructor(message: string, readonly configPath: string) {
    super(DeployErrorCode.INVALID_CONFIG, message, { configPath });
    this.name = 'ConfigError';
  }
}
