import type { Check, CheckContext, CheckResult } from './types.js';
import type { Host } from '../runner/executor-interface.js';
import type { LagSample, Topology } from '../topology/topology.js';
import { LagParseError, TimeoutError, errorMessage } from '../runner/errors.js';
import { runOnHosts } from './index.js';

const SECONDS_BEHIND_PATTERN = /^\s*Seconds_Behind_Master:\s*(\S*)\s*$/m;
const NUMERIC_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse replica lag out of `SHOW SLAVE STATUS\G` or a single-value query.
 * Empty output means the server is not replicating; NULL means stopped.
 */
export function parseLagOutput(stdout: string): number | null {
  const output = stdout.trim();
  if (output === '') {
    return null;
  }

  const match = SECONDS_BEHIND_PATTERN.exec(output);
  const value = match ? match[1] : output;

  if (value.toUpperCase() === 'NULL') {
    return null;
  }
  if (NUMERIC_PATTERN.test(value)) {
    return Number(value);
  }

  throw new LagParseError(
    match
      ? `unrecognized Seconds_Behind_Master value: ${JSON.stringify(value)}`
      : 'output is neither replication status nor a lag value',
    stdout
  );
}

export function isWithinLag(sample: LagSample, maxLagSeconds: number): boolean {
  return sample.lagSeconds !== null && sample.lagSeconds <= maxLagSeconds;
}

export interface LagWaitOptions {
  maxLagSeconds: number;
  budgetMs: number;
  pollIntervalMs: number;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export interface LagWaitOutcome {
  converged: boolean;
  samples: LagSample[];
  problems: string[];
  error?: TimeoutError;
}

/**
 * Poll every replica until all are within `maxLagSeconds`, or the budget runs out.
 * A replica whose status cannot be parsed counts as lagging.
 */
export async function waitForReplication(topology: Topology, options: LagWaitOptions): Promise<LagWaitOutcome> {
  const started = options.now();

  for (;;) {
    const { samples, problems } = await sampleReplicas(topology, topology.replicas(), options.maxLagSeconds);
    if (problems.length === 0) {
      return { converged: true, samples, problems };
    }

    const elapsed = options.now() - started;
    if (elapsed >= options.budgetMs) {
      const error = new TimeoutError(
        `replication did not converge below ${options.maxLagSeconds}s within ${options.budgetMs}ms: ${problems.join('; ')}`,
        options.budgetMs
      );
      return { converged: false, samples, problems, error };
    }

    await options.sleep(Math.min(options.pollIntervalMs, options.budgetMs - elapsed));
  }
}

async function sampleReplicas(
  topology: Topology,
  replicas: readonly Host[],
  maxLagSeconds: number
): Promise<{ samples: LagSample[]; problems: string[] }> {
  const samples: LagSample[] = [];
  const problems: string[] = [];

  const outcomes = await Promise.all(
    replicas.map(async replica => {
      try {
        return { replica, sample: await topology.lag(replica) };
      } catch (err) {
        if (err instanceof LagParseError) {
          return { replica, error: err.message };
        }
        throw err;
      }
    })
  );

  for (const outcome of outcomes) {
    if ('error' in outcome) {
      problems.push(`${outcome.replica.name}: ${outcome.error}`);
      continue;
    }
    samples.push(outcome.sample);
    if (!isWithinLag(outcome.sample, maxLagSeconds)) {
      problems.push(
        `${outcome.replica.name}: ${outcome.sample.lagSeconds === null ? 'replication stopped or unknown' : `lag ${outcome.sample.lagSeconds}s`}`
      );
    }
  }

  return { samples, problems };
}

export function replicaLagCheck(maxLagSeconds: number): Check {
  const check: Check = {
    name: 'replica-lag',
    description: `Verify every replica is replicating within ${maxLagSeconds}s of its master`,
    applicableRoles: ['replica'],

    run(ctx: CheckContext): Promise<CheckResult[]> {
      return runOnHosts(ctx, check.applicableRoles, async (hostCtx, replica): Promise<CheckResult> => {
        const startTime = Date.now();
        try {
          const sample = await hostCtx.topology.lag(replica);
          return {
            name: 'replica-lag',
            node: replica.name,
            passed: isWithinLag(sample, maxLagSeconds),
            message:
              sample.lagSeconds === null
                ? 'replication stopped or not configured'
                : `lag ${sample.lagSeconds}s (max ${maxLagSeconds}s)`,
            durationMs: Date.now() - startTime,
          };
        } catch (err) {
          return {
            name: 'replica-lag',
            node: replica.name,
            passed: false,
            message: `error: ${errorMessage(err)}`,
            durationMs: Date.now() - startTime,
          };
        }
      });
    },
  };
  return check;
}
