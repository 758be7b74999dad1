import type { Check, CheckResult, CheckContext } from './types.js';
import { runOnHosts } from './run-on-hosts.js';

export const connectivityCheck: Check = {
  name: 'connectivity',
  description: 'Verify every host accepts remote commands',

  run(ctx: CheckContext): Promise<CheckResult[]> {
    return runOnHosts(ctx, runOnHost);
  },
};

async function runOnHost(ctx: CheckContext, host: string): Promise<CheckResult> {
  const startTime = Date.now();

  try {
    const result = await ctx.shell.run(host, 'echo "ok"');
    const passed = result.stdout.includes('ok');
    return {
      name: 'connectivity',
      host,
      passed,
      message: passed ? 'connected' : `unexpected output: ${result.stdout}`,
      durationMs: Date.now() - startTime,
    };
  } catch (err) {
    return {
      name: 'connectivity',
      host,
      passed: false,
      message: `error: ${err instanceof Error ? err.message : String(err)}`,
      durationMs: Date.now() - startTime,
    };
  }
}
