import type { Check, CheckResult, CheckContext } from './types.js';
import { runOnHosts } from './run-on-hosts.js';
import { SETTING_JAVA_HOME } from '../frameworks/hadoop.js';

export const javaHomeCheck: Check = {
  name: 'java-home',
  description: 'Verify the configured java_home holds a java binary on every host',

  async run(ctx: CheckContext): Promise<CheckResult[]> {
    const javaHome = ctx.config.settings[SETTING_JAVA_HOME];
    if (javaHome === undefined || javaHome === '') {
      return [];
    }
    return runOnHosts(ctx, (c, host) => runOnHost(c, host, String(javaHome)));
  },
};

async function runOnHost(ctx: CheckContext, host: string, javaHome: string): Promise<CheckResult> {
  const startTime = Date.now();
  const javaBin = `${javaHome}/bin/java`;

  try {
    await ctx.shell.run(host, `test -x "${javaBin}"`);
    return {
      name: 'java-home',
      host,
      passed: true,
      message: `found ${javaBin}`,
      durationMs: Date.now() - startTime,
    };
  } catch {
    return {
      name: 'java-home',
      host,
      passed: false,
      message: `${javaBin} is missing or not executable`,
      durationMs: Date.now() - startTime,
    };
  }
}
