import { randomUUID } from 'crypto';
import type { CommandResult, Host } from '../runner/executor-interface.js';
import { hostKey } from '../runner/executor-interface.js';
import { InvalidTargetError, InvalidTransitionError } from '../runner/errors.js';

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'aborted';
export type HostStatus = JobStatus;
export type TerminalStatus = Extract<JobStatus, 'succeeded' | 'failed' | 'aborted'>;

export type SchemaChangeMode = 'per-host' | 'replicated';
export type FailureStep = 'schema-change' | 'replication-lag';

export interface HostFailure {
  step: FailureStep;
  /** Error class name, e.g. TransientCommandFailure */
  kind: string;
  message: string;
}

export interface HostProgress {
  readonly host: Host;
  readonly status: HostStatus;
  readonly attempts: readonly CommandResult[];
  readonly startedAt?: Date;
  readonly finishedAt?: Date;
  readonly failure?: HostFailure;
}

export interface SchemaChangeRequest {
  /** `database.table` */
  table: string;
  /** ALTER clause without the `ALTER TABLE name` prefix, e.g. "ADD COLUMN x INT" */
  alter: string;
  dryRun: boolean;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'aborted'],
  running: ['succeeded', 'failed', 'aborted'],
  succeeded: [],
  failed: [],
  aborted: [],
};

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0;
}

function assertTransition(what: string, from: JobStatus, to: JobStatus): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(`${what}: cannot move from ${from} to ${to}`);
  }
}

/**
 * State of one schema change across a topology. Owned by the orchestrator;
 * the transition methods are the only way to change it.
 */
export class SchemaChangeJob {
  readonly id: string;
  private jobStatus: JobStatus = 'pending';
  private started?: Date;
  private finished?: Date;
  private abortReason?: string;
  private readonly progress = new Map<string, HostProgress>();

  constructor(
    readonly request: Readonly<SchemaChangeRequest>,
    readonly mode: SchemaChangeMode,
    readonly order: readonly Host[],
    id: string = randomUUID(),
  ) {
    if (order.length === 0) {
      throw new InvalidTargetError('A schema change job needs at least one host');
    }
    this.id = id;
    for (const host of order) {
      const key = hostKey(host);
      if (this.progress.has(key)) {
        throw new InvalidTargetError(`Host ${key} appears twice in the execution order`);
      }
      this.progress.set(key, { host, status: 'pending', attempts: [] });
    }
  }

  get status(): JobStatus {
    return this.jobStatus;
  }

  get startedAt(): Date | undefined {
    return this.started;
  }

  get finishedAt(): Date | undefined {
    return this.finished;
  }

  get abortRequested(): boolean {
    return this.abortReason !== undefined;
  }

  get abortRequestReason(): string | undefined {
    return this.abortReason;
  }

  /** Per-host progress in execution order. */
  hosts(): HostProgress[] {
    return this.order.map(host => this.get(host));
  }

  get(host: Pick<Host, 'address' | 'port'>): HostProgress {
    const entry = this.progress.get(hostKey(host));
    if (!entry) {
      throw new InvalidTargetError(`Host ${hostKey(host)} is not part of job ${this.id}`);
    }
    return entry;
  }

  /**
   * Ask the job to stop at the next safe boundary. Has no effect once the
   * job is terminal.
   */
  requestAbort(reason = 'abort requested'): void {
    if (!isTerminal(this.jobStatus) && this.abortReason === undefined) {
      this.abortReason = reason;
    }
  }

  start(at: Date): void {
    assertTransition(`job ${this.id}`, this.jobStatus, 'running');
    this.jobStatus = 'running';
    this.started = at;
  }

  finish(status: TerminalStatus, at: Date): void {
    assertTransition(`job ${this.id}`, this.jobStatus, status);
    this.jobStatus = status;
    this.started ??= at;
    this.finished = at;
  }

  hostStarted(host: Host, at: Date): void {
    this.update(host, 'running', entry => ({ ...entry, status: 'running', startedAt: at }));
  }

  recordAttempt(host: Host, result: CommandResult): void {
    const entry = this.get(host);
    if (entry.status !== 'running') {
      throw new InvalidTransitionError(`host ${hostKey(host)}: cannot record an attempt while ${entry.status}`);
    }
    this.progress.set(hostKey(host), { ...entry, attempts: [...entry.attempts, result] });
  }

  hostSucceeded(host: Host, at: Date): void {
    this.update(host, 'succeeded', entry => ({ ...entry, status: 'succeeded', finishedAt: at }));
  }

  hostFailed(host: Host, failure: HostFailure, at: Date): void {
    this.update(host, 'failed', entry => ({ ...entry, status: 'failed', finishedAt: at, failure }));
  }

  hostAborted(host: Host, at: Date): void {
    this.update(host, 'aborted', entry => ({ ...entry, status: 'aborted', finishedAt: at }));
  }

  private update(host: Host, to: HostStatus, next: (entry: HostProgress) => HostProgress): void {
    if (this.jobStatus !== 'running') {
      throw new InvalidTransitionError(`job ${this.id} is ${this.jobStatus}, host updates need a running job`);
    }
    const entry = this.get(host);
    assertTransition(`host ${hostKey(host)}`, entry.status, to);
    this.progress.set(hostKey(host), next(entry));
  }
}
