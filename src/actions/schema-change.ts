/**
 * Online schema change orchestration.
 *
 * Hosts are processed strictly one at a time: in per-host mode every replica in
 * inventory order, then the master; in replicated mode the master alone. After
 * each host the replicas must catch up before the next host is touched. The
 * first host that cannot be changed stops the job, so the master never ends up
 * with a schema the replicas do not have.
 */

import type { CommandResult, CommandSpec, Host } from '../runner/executor-interface.js';
import { TIMEOUT_EXIT_CODE, UNREACHABLE_EXIT_CODE } from '../runner/executor-interface.js';
import type { FleetOscError } from '../runner/errors.js';
import {
  ConfigError,
  InvalidTargetError,
  NonRetryableCommandFailure,
  TimeoutError,
  TransientCommandFailure,
  errorMessage,
} from '../runner/errors.js';
import type { RetryPolicy, SchemaChangePolicy } from '../runner/config.js';
import type { Topology } from '../topology/topology.js';
import { waitForReplication } from '../checks/replica-lag.js';
import type { Logger } from '../lib/log.js';
import { consoleLogger } from '../lib/log.js';
import { sleep } from '../lib/pool.js';
import { SchemaChangeJob } from './schema-change-job.js';
import type { FailureStep, SchemaChangeMode, SchemaChangeRequest } from './schema-change-job.js';
import type { SchemaChangeTool } from './schema-change-tool.js';
import { buildSchemaChangeCommand, validateRequest } from './schema-change-tool.js';

export interface OrchestratorDeps {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

type AttemptOutcome = { ok: true } | { ok: false; error: FleetOscError };

export function executionOrder(topology: Topology, mode: SchemaChangeMode): Host[] {
  return mode === 'per-host' ? [...topology.replicas(), topology.master()] : [topology.master()];
}

export function backoffDelay(retry: RetryPolicy, failedAttempts: number): number {
  const exponent = Math.max(0, failedAttempts - 1);
  return Math.min(retry.maxDelayMs, retry.baseDelayMs * 2 ** exponent);
}

export function compileRetryablePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(pattern, 'i');
    } catch (err) {
      throw new ConfigError(`Invalid retryable pattern ${JSON.stringify(pattern)}: ${errorMessage(err)}`);
    }
  });
}

/**
 * Sort one tool result into success, a retryable failure or a fatal one.
 */
export function classifyResult(
  result: CommandResult,
  policy: SchemaChangePolicy,
  retryablePatterns: readonly RegExp[] = compileRetryablePatterns(policy.retryablePatterns)
): AttemptOutcome {
  const where = result.host.name;

  if (result.timedOut || result.exitCode === TIMEOUT_EXIT_CODE) {
    return {
      ok: false,
      error: new TimeoutError(`${where}: schema change timed out after ${policy.toolTimeoutMs}ms`, policy.toolTimeoutMs),
    };
  }

  if (policy.successExitCodes.includes(result.exitCode)) {
    return { ok: true };
  }

  const detail = lastLine(result.stderr) || lastLine(result.stdout) || 'no output';

  if (
    result.exitCode === UNREACHABLE_EXIT_CODE ||
    policy.retryableExitCodes.includes(result.exitCode) ||
    retryablePatterns.some(pattern => pattern.test(result.stderr))
  ) {
    return {
      ok: false,
      error: new TransientCommandFailure(`${where}: exit ${result.exitCode}: ${detail}`, result.exitCode),
    };
  }

  return {
    ok: false,
    error: new NonRetryableCommandFailure(`${where}: exit ${result.exitCode}: ${detail}`, result.exitCode),
  };
}

export class SchemaChangeOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly retryablePatterns: readonly RegExp[];

  constructor(
    private readonly topology: Topology,
    private readonly tool: SchemaChangeTool,
    private readonly policy: SchemaChangePolicy,
    deps: OrchestratorDeps = {},
  ) {
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? consoleLogger;
    this.retryablePatterns = compileRetryablePatterns(policy.retryablePatterns);
  }

  createJob(request: SchemaChangeRequest, id?: string): SchemaChangeJob {
    validateRequest(request);
    return new SchemaChangeJob({ ...request }, this.policy.mode, executionOrder(this.topology, this.policy.mode), id);
  }

  /**
   * Drive a job to a terminal state. Failures are recorded in the job, not
   * thrown; only misuse (e.g. a host the executor rejects) propagates.
   */
  async run(job: SchemaChangeJob): Promise<SchemaChangeJob> {
    job.start(this.date());
    const { request } = job;
    this.logger.info(
      `[osc] job ${job.id}: ${request.dryRun ? 'dry run of ' : ''}${request.table} "${request.alter}" on ` +
        job.order.map(h => h.name).join(' -> ')
    );

    for (const host of job.order) {
      if (job.abortRequested) {
        this.logger.info(`[osc] job ${job.id}: aborted before ${host.name} (${job.abortRequestReason})`);
        job.finish('aborted', this.date());
        return job;
      }

      const done = await this.processHost(job, host);
      if (done) {
        return job;
      }
    }

    job.finish('succeeded', this.date());
    this.logger.info(`[osc] job ${job.id}: ✓ succeeded on ${job.order.length} host(s)`);
    return job;
  }

  /** Returns true when the job reached a terminal state on this host. */
  private async processHost(job: SchemaChangeJob, host: Host): Promise<boolean> {
    job.hostStarted(host, this.date());
    this.logger.info(`[osc] ${host.name}: running schema change`);

    const spec = buildSchemaChangeCommand(host, job.request, {
      toolPath: this.policy.toolPath,
      mode: job.mode,
      maxLagSeconds: this.policy.maxLagSeconds,
      timeoutMs: this.policy.toolTimeoutMs,
      successExitCodes: this.policy.successExitCodes,
    });

    const { maxAttempts } = this.policy.retry;
    let lastError: FleetOscError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        if (job.abortRequested) {
          return this.abortOn(job, host);
        }
        const delay = backoffDelay(this.policy.retry, attempt - 1);
        this.logger.warn(`[osc] ${host.name}: attempt ${attempt}/${maxAttempts} in ${delay}ms after: ${lastError?.message}`);
        await this.sleep(delay);
      }

      const outcome = await this.attempt(job, host, spec);
      if (outcome.ok) {
        lastError = undefined;
        break;
      }

      lastError = outcome.error;
      if (!lastError.retryable) {
        return this.failOn(job, host, 'schema-change', lastError);
      }
    }

    if (lastError) {
      return this.failOn(job, host, 'schema-change', lastError, maxAttempts);
    }

    if (!job.request.dryRun) {
      const gate = await this.awaitReplication(job, host);
      if (gate === 'aborted') {
        return this.abortOn(job, host);
      }
      if (gate) {
        return this.failOn(job, host, 'replication-lag', gate, maxAttempts);
      }
    }

    job.hostSucceeded(host, this.date());
    this.logger.info(`[osc] ${host.name}: ✓ done`);
    return false;
  }

  private async attempt(
    job: SchemaChangeJob,
    host: Host,
    spec: CommandSpec
  ): Promise<AttemptOutcome> {
    let result: CommandResult;
    try {
      result = await this.tool.run(host, spec);
    } catch (err) {
      if (err instanceof InvalidTargetError) {
        throw err;
      }
      return {
        ok: false,
        error: new TransientCommandFailure(`${host.name}: schema change tool failed to run: ${errorMessage(err)}`, null),
      };
    }

    job.recordAttempt(host, result);
    return classifyResult(result, this.policy, this.retryablePatterns);
  }

  /**
   * Lag gate with the same retry budget as the tool. Returns the final error,
   * or 'aborted' when an abort request arrives between gate attempts.
   */
  private async awaitReplication(job: SchemaChangeJob, host: Host): Promise<TimeoutError | 'aborted' | undefined> {
    const { retry } = this.policy;
    let lastError: TimeoutError | undefined;

    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        if (job.abortRequested) {
          return 'aborted';
        }
        const delay = backoffDelay(retry, attempt - 1);
        this.logger.warn(`[osc] ${host.name}: replication check ${attempt}/${retry.maxAttempts} in ${delay}ms`);
        await this.sleep(delay);
      }

      const outcome = await waitForReplication(this.topology, {
        maxLagSeconds: this.policy.maxLagSeconds,
        budgetMs: this.policy.lagWaitMs,
        pollIntervalMs: this.policy.lagPollIntervalMs,
        sleep: this.sleep,
        now: this.now,
      });

      if (outcome.converged) {
        return undefined;
      }
      lastError = outcome.error;
    }

    return lastError;
  }

  private failOn(
    job: SchemaChangeJob,
    host: Host,
    step: FailureStep,
    error: FleetOscError,
    attempts?: number
  ): boolean {
    const message = attempts !== undefined && error.retryable
      ? `${error.message} (gave up after ${attempts} attempt(s))`
      : error.message;
    const at = this.date();
    job.hostFailed(host, { step, kind: error.name, message }, at);
    job.finish('failed', at);
    this.logger.warn(`[osc] job ${job.id}: ✗ failed on ${host.name} during ${step}: ${message}`);
    return true;
  }

  private abortOn(job: SchemaChangeJob, host: Host): boolean {
    const at = this.date();
    job.hostAborted(host, at);
    job.finish('aborted', at);
    this.logger.info(`[osc] job ${job.id}: aborted on ${host.name} (${job.abortRequestReason})`);
    return true;
  }

  private date(): Date {
    return new Date(this.now());
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1]?.trim() ?? '';
}
