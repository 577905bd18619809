import type { Check, CheckResult, CheckContext } from './types.js';
import type { Host, HostRole } from '../runner/executor-interface.js';
import { connectivityCheck } from './connectivity.js';
import { replicaLagCheck } from './replica-lag.js';

// Check groups run sequentially, but checks within a group run in parallel
export function getCheckGroups(maxLagSeconds: number): Check[][] {
  return [
    // Group 1: every host must be reachable before replication is inspected
    [connectivityCheck],
    [replicaLagCheck(maxLagSeconds)],
  ];
}

// Helper for checks that run on each applicable host in parallel
export async function runOnHosts(
  ctx: CheckContext,
  applicableRoles: HostRole[] | undefined,
  runOnHost: (ctx: CheckContext, host: Host) => Promise<CheckResult>
): Promise<CheckResult[]> {
  const hosts = applicableRoles?.length
    ? ctx.topology.hosts().filter(h => applicableRoles.includes(h.role))
    : ctx.topology.hosts();

  return Promise.all(hosts.map(host => runOnHost(ctx, host)));
}

export interface ValidationOptions {
  maxLagSeconds: number;
  onResult?: (result: CheckResult) => void;
}

export interface ValidationResult {
  passed: number;
  failed: number;
  results: CheckResult[];
}

export async function runValidation(
  ctx: CheckContext,
  options: ValidationOptions
): Promise<ValidationResult> {
  const { onResult } = options;
  const allResults: CheckResult[] = [];
  let totalPassed = 0;
  let totalFailed = 0;

  for (const group of getCheckGroups(options.maxLagSeconds)) {
    const groupResultArrays = await Promise.all(group.map(check => check.run(ctx)));

    for (const results of groupResultArrays) {
      for (const result of results) {
        allResults.push(result);
        if (result.passed) {
          totalPassed++;
        } else {
          totalFailed++;
        }
        onResult?.(result);
      }
    }

    // A failed group makes the later groups meaningless
    if (totalFailed > 0) {
      break;
    }
  }

  return { passed: totalPassed, failed: totalFailed, results: allResults };
}

export type { Check, CheckResult, CheckContext } from './types.js';
