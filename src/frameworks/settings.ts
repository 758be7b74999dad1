import { UnsupportedSettingError } from '../errors.js';
import type { DeploymentSettings, SettingValue } from './types.js';

const TRUTHY = new Set(['true', 't', 'yes', 'y', '1']);

// Anything outside the truthy set is false, unrecognised words included.
export function parseBooleanSetting(value: SettingValue): boolean {
  return TRUTHY.has(String(value).toLowerCase());
}

export function parsePositiveIntSetting(key: string, value: SettingValue): number {
  const text = String(value).trim();
  const parsed = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new UnsupportedSettingError(
      `Setting "${key}" must be a positive integer, got "${String(value)}"`,
      [key],
      'invalid',
    );
  }
  return parsed;
}

// Reads settings without mutating the caller's map; unread keys are leftovers.
export class SettingsClaim {
  private readonly claimed = new Set<string>();

  constructor(
    private readonly frameworkName: string,
    private readonly settings: DeploymentSettings,
  ) {}

  claim(key: string, defaultValue: SettingValue): SettingValue {
    this.claimed.add(key);
    return Object.hasOwn(this.settings, key) ? this.settings[key] : defaultValue;
  }

  require(key: string): SettingValue {
    this.claimed.add(key);
    if (!Object.hasOwn(this.settings, key)) {
      throw new UnsupportedSettingError(
        `Missing required setting for ${this.frameworkName}: '${key}'`,
        [key],
        'missing',
      );
    }
    return this.settings[key];
  }

  unclaimed(): string[] {
    return Object.keys(this.settings).filter(key => !this.claimed.has(key));
  }

  assertFullyClaimed(): void {
    const leftover = this.unclaimed();
    if (leftover.length > 0) {
      throw new UnsupportedSettingError(
        `Found unknown settings for ${this.frameworkName}: '${leftover.join("','")}'`,
        leftover,
        'unknown',
      );
    }
  }
}
