import type { Check, CheckResult, CheckContext } from './types.js';
import { connectivityCheck } from './connectivity.js';
import { javaHomeCheck } from './java-home.js';

// Checks run in order; a failing check stops the ones after it
const checks: Check[] = [
  connectivityCheck,
  javaHomeCheck,
];

export function getAllChecks(): Check[] {
  return checks;
}

export interface PreflightOptions {
  checks?: Check[];
  onResult?: (result: CheckResult) => void;
}

export interface PreflightResult {
  passed: number;
  failed: number;
  results: CheckResult[];
}

export async function runPreflight(
  ctx: CheckContext,
  options: PreflightOptions = {}
): Promise<PreflightResult> {
  const { onResult } = options;

  const allResults: CheckResult[] = [];
  let totalPassed = 0;
  let totalFailed = 0;

  for (const check of options.checks ?? checks) {
    const results = await check.run(ctx);

    for (const result of results) {
      allResults.push(result);
      if (result.passed) {
        totalPassed++;
      } else {
        totalFailed++;
      }
      onResult?.(result);
    }

    if (totalFailed > 0) {
      break;
    }
  }

  return { passed: totalPassed, failed: totalFailed, results: allResults };
}

export type { Check, CheckResult, CheckContext } from './types.js';
