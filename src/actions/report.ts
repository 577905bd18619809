import { hostKey } from '../runner/executor-interface.js';
import type { HostRole } from '../runner/executor-interface.js';
import { IncompleteJobError } from '../runner/errors.js';
import { isTerminal } from './schema-change-job.js';
import type {
  FailureStep,
  HostFailure,
  HostStatus,
  SchemaChangeJob,
  SchemaChangeMode,
  TerminalStatus,
} from './schema-change-job.js';

export interface HostReport {
  host: string;
  name: string;
  role: HostRole;
  status: HostStatus;
  attempts: number;
  lastExitCode: number | null;
  durationMs: number | null;
  failure: HostFailure | null;
}

export interface JobReport {
  jobId: string;
  table: string;
  alter: string;
  dryRun: boolean;
  mode: SchemaChangeMode;
  status: TerminalStatus;
  startedAt: string;
  finishedAt: string;
  totalDurationMs: number;
  hosts: HostReport[];
  failedHost: { host: string; step: FailureStep; message: string } | null;
  counts: Record<HostStatus, number>;
}

/**
 * Summarize a finished job. Reads only what the job recorded, so the same job
 * always yields the same report.
 */
export function summarizeJob(job: SchemaChangeJob): JobReport {
  const { status, startedAt, finishedAt } = job;
  if (!isTerminal(status) || !startedAt || !finishedAt) {
    throw new IncompleteJobError(`Job ${job.id} is ${status}; only finished jobs can be reported`);
  }

  const counts: Record<HostStatus, number> = { pending: 0, running: 0, succeeded: 0, failed: 0, aborted: 0 };
  let failedHost: JobReport['failedHost'] = null;

  const hosts = job.hosts().map((progress): HostReport => {
    counts[progress.status]++;
    const last = progress.attempts[progress.attempts.length - 1];
    const key = hostKey(progress.host);

    if (progress.failure && !failedHost) {
      failedHost = { host: key, step: progress.failure.step, message: progress.failure.message };
    }

    return {
      host: key,
      name: progress.host.name,
      role: progress.host.role,
      status: progress.status,
      attempts: progress.attempts.length,
      lastExitCode: last ? last.exitCode : null,
      durationMs:
        progress.startedAt && progress.finishedAt
          ? progress.finishedAt.getTime() - progress.startedAt.getTime()
          : null,
      failure: progress.failure ? { ...progress.failure } : null,
    };
  });

  return {
    jobId: job.id,
    table: job.request.table,
    alter: job.request.alter,
    dryRun: job.request.dryRun,
    mode: job.mode,
    status,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    totalDurationMs: finishedAt.getTime() - startedAt.getTime(),
    hosts,
    failedHost,
    counts,
  };
}

const STATUS_ICONS: Record<HostStatus, string> = {
  pending: '·',
  running: '…',
  succeeded: '✓',
  failed: '✗',
  aborted: '!',
};

export function formatReport(report: JobReport): string {
  const lines = [
    `Schema change ${report.jobId}: ${report.status.toUpperCase()}${report.dryRun ? ' (dry run)' : ''}`,
    `  table: ${report.table}`,
    `  alter: ${report.alter}`,
    `  mode:  ${report.mode}`,
    `  duration: ${report.totalDurationMs}ms`,
    '',
  ];

  for (const host of report.hosts) {
    const timing = host.durationMs === null ? 'not attempted' : `${host.durationMs}ms`;
    const attempts = host.attempts === 1 ? '1 attempt' : `${host.attempts} attempts`;
    lines.push(`  ${STATUS_ICONS[host.status]} ${host.name} [${host.role}] ${host.status} (${attempts}, ${timing})`);
    if (host.failure) {
      lines.push(`      ${host.failure.step}: ${host.failure.message}`);
    }
  }

  lines.push(
    '',
    `${report.counts.succeeded} succeeded, ${report.counts.failed} failed, ` +
      `${report.counts.aborted} aborted, ${report.counts.pending} not attempted`
  );
  return lines.join('\n');
}

export function exitCodeFor(status: TerminalStatus): number {
  switch (status) {
    case 'succeeded':
      return 0;
    case 'failed':
      return 1;
    case 'aborted':
      return 2;
  }
}
