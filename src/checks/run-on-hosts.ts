import type { CheckResult, CheckContext } from './types.js';

// Helper for checks that run on each host, one after another
export async function runOnHosts(
  ctx: CheckContext,
  runOnHost: (ctx: CheckContext, host: string) => Promise<CheckResult>
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const host of ctx.config.hosts) {
    results.push(await runOnHost(ctx, host.name));
  }
  return results;
}
