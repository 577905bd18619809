import type { Check, CheckContext, CheckResult } from './types.js';
import { createCommandSpec, hostKey } from '../runner/executor-interface.js';
import type { Host } from '../runner/executor-interface.js';
import { runOnHosts } from './index.js';

const PING_TIMEOUT_MS = 15000;

export const connectivityCheck: Check = {
  name: 'connectivity',
  description: 'Verify every server answers a ping through the executor',

  run(ctx: CheckContext): Promise<CheckResult[]> {
    return runOnHosts(ctx, undefined, pingHost);
  },
};

export function pingArgs(host: Host): string[] {
  return [
    ...(host.credentials ? [`--defaults-file=${host.credentials}`] : []),
    '-h', host.address,
    '-P', String(host.port),
    'ping',
  ];
}

async function pingHost(ctx: CheckContext, host: Host): Promise<CheckResult> {
  const startTime = Date.now();
  const spec = createCommandSpec({ program: 'mysqladmin', args: pingArgs(host), timeoutMs: PING_TIMEOUT_MS });
  const result = (await ctx.executor.execute([host], spec)).get(hostKey(host));

  const passed = result !== undefined && result.exitCode === 0;
  return {
    name: 'connectivity',
    node: host.name,
    passed,
    message: passed
      ? 'connected'
      : `failed (exit ${result?.exitCode ?? 'none'})${result?.stderr ? `: ${result.stderr}` : ''}`,
    durationMs: Date.now() - startTime,
  };
}
