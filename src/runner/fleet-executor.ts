import type { CommandResult, CommandSpec, Host, RemoteExecutor } from './executor-interface.js';
import {
  TIMEOUT_EXIT_CODE,
  UNREACHABLE_EXIT_CODE,
  appendLine,
  hostKey,
  timeoutMarker,
} from './executor-interface.js';
import { InvalidTargetError, errorMessage } from './errors.js';
import { formatCommand } from '../lib/shell.js';
import { mapWithConcurrency } from '../lib/pool.js';
import type { Logger } from '../lib/log.js';
import { silentLogger } from '../lib/log.js';

export type FleetInvocationStatus = 'success' | 'failed' | 'timed-out' | 'undeliverable';

export interface FleetInvocation {
  status: FleetInvocationStatus;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface FleetTarget {
  instanceId: string;
  host: Host;
}

export interface FleetRunOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * A cluster execution service: submit one shell command for one target and
 * wait for its outcome. The service is expected to honor `signal` by
 * cancelling the remote invocation.
 */
export interface FleetService {
  run(target: FleetTarget, command: string, options: FleetRunOptions): Promise<FleetInvocation>;
  close?(): Promise<void>;
}

export interface FleetExecutorOptions {
  maxConcurrency?: number;
  logger?: Logger;
}

export const DEFAULT_FLEET_CONCURRENCY = 8;

export class FleetExecutor implements RemoteExecutor {
  readonly kind = 'fleet' as const;
  private readonly maxConcurrency: number;
  private readonly logger: Logger;

  constructor(private readonly service: FleetService, options: FleetExecutorOptions = {}) {
    this.maxConcurrency = options.maxConcurrency ?? DEFAULT_FLEET_CONCURRENCY;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(targets: readonly Host[], spec: CommandSpec): Promise<Map<string, CommandResult>> {
    if (targets.length === 0) {
      throw new InvalidTargetError('FleetExecutor requires at least one target');
    }

    const unique = new Map<string, FleetTarget>();
    for (const host of targets) {
      if (!host.instanceId) {
        throw new InvalidTargetError(`Host ${hostKey(host)} has no fleet instanceId`);
      }
      unique.set(hostKey(host), { instanceId: host.instanceId, host });
    }

    const command = formatCommand(spec);
    const fleetTargets = Array.from(unique.values());
    this.logger.info(`[fleet] ${command} on ${fleetTargets.length} host(s)`);

    const results = await mapWithConcurrency(fleetTargets, this.maxConcurrency, target =>
      this.runOne(target, command, spec)
    );

    return new Map(results.map((result): [string, CommandResult] => [hostKey(result.host), result]));
  }

  async close(): Promise<void> {
    await this.service.close?.();
  }

  private async runOne(target: FleetTarget, command: string, spec: CommandSpec): Promise<CommandResult> {
    const startedAt = new Date();
    const started = Date.now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<'deadline'>(resolve => {
      timer = setTimeout(() => resolve('deadline'), spec.timeoutMs);
    });

    let outcome: FleetInvocation | 'deadline';
    try {
      outcome = await Promise.race([
        this.service.run(target, command, { timeoutMs: spec.timeoutMs, signal: controller.signal }),
        deadline,
      ]);
    } catch (err) {
      outcome = { status: 'undeliverable', exitCode: null, stdout: '', stderr: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }

    if (outcome === 'deadline') {
      controller.abort();
      outcome = { status: 'timed-out', exitCode: null, stdout: '', stderr: '' };
    }

    const result = toCommandResult(target.host, outcome, spec, startedAt, Date.now() - started);
    if (result.exitCode !== 0) {
      this.logger.warn(`[fleet] ${target.host.name}: ${outcome.status} (exit ${result.exitCode})`);
    }
    return result;
  }
}

function toCommandResult(
  host: Host,
  invocation: FleetInvocation,
  spec: CommandSpec,
  startedAt: Date,
  durationMs: number
): CommandResult {
  const base = { host, stdout: invocation.stdout.trim(), startedAt, durationMs };
  const stderr = invocation.stderr.trim();

  switch (invocation.status) {
    case 'timed-out':
      return {
        ...base,
        exitCode: TIMEOUT_EXIT_CODE,
        stderr: appendLine(stderr, timeoutMarker(spec.timeoutMs)),
        timedOut: true,
      };
    case 'undeliverable':
      return {
        ...base,
        exitCode: UNREACHABLE_EXIT_CODE,
        stderr: appendLine(stderr, `host ${host.name} is unreachable through the fleet service`),
        timedOut: false,
      };
    case 'success':
    case 'failed':
      return {
        ...base,
        exitCode: invocation.exitCode ?? (invocation.status === 'success' ? 0 : UNREACHABLE_EXIT_CODE),
        stderr,
        timedOut: false,
      };
  }
}
