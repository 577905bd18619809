import { describe, expect, it } from 'vitest';
import { Topology } from '../src/topology/topology.js';
import { SchemaChangeOrchestrator } from '../src/actions/schema-change.js';
import { SchemaChangeJob } from '../src/actions/schema-change-job.js';
import { exitCodeFor, formatReport, summarizeJob } from '../src/actions/report.js';
import { defaultSchemaChangePolicy } from '../src/runner/config.js';
import { IncompleteJobError } from '../src/runner/errors.js';
import { silentLogger } from '../src/lib/log.js';
import { FakeTool, M, R1, fakeClock, host, lagExecutor } from './fakes.js';

async function runJob(tool: FakeTool) {
  const clock = fakeClock(Date.UTC(2024, 0, 1));
  const topology = new Topology([M, R1], lagExecutor({}));
  const orchestrator = new SchemaChangeOrchestrator(topology, tool, defaultSchemaChangePolicy(), {
    sleep: clock.sleep,
    now: clock.now,
    logger: silentLogger,
  });
  const job = orchestrator.createJob({ table: 'app.users', alter: 'ADD COLUMN x INT', dryRun: false }, 'job-42');
  return orchestrator.run(job);
}

describe('summarizeJob', () => {
  it('reports a fully successful change on M and R1', async () => {
    const job = await runJob(new FakeTool());
    const report = summarizeJob(job);

    expect(report.status).toBe('succeeded');
    expect(report.hosts.map(h => [h.name, h.status])).toEqual([
      ['R1', 'succeeded'],
      ['M', 'succeeded'],
    ]);
    expect(report.hosts[0]).toEqual({
      host: '10.0.0.2:3306',
      name: 'R1',
      role: 'replica',
      status: 'succeeded',
      attempts: 1,
      lastExitCode: 0,
      durationMs: 0,
      failure: null,
    });
    expect(report.failedHost).toBeNull();
    expect(report.counts).toEqual({ pending: 0, running: 0, succeeded: 2, failed: 0, aborted: 0 });
    expect(report.startedAt).toBe('2024-01-01T00:00:00.000Z');
    expect(report.totalDurationMs).toBe(0);
    expect(exitCodeFor(report.status)).toBe(0);
  });

  it('names the failed host and step', async () => {
    const job = await runJob(new FakeTool(h => (h.name === 'R1' ? { exitCode: 2, stderr: 'syntax error' } : {})));
    const report = summarizeJob(job);

    expect(report.status).toBe('failed');
    expect(report.failedHost).toEqual({ host: '10.0.0.2:3306', step: 'schema-change', message: 'R1: exit 2: syntax error' });
    expect(report.hosts[1]).toMatchObject({ name: 'M', status: 'pending', attempts: 0, durationMs: null, lastExitCode: null });
    expect(exitCodeFor(report.status)).toBe(1);
  });

  it('returns identical summaries for the same job', async () => {
    const job = await runJob(new FakeTool());
    expect(summarizeJob(job)).toEqual(summarizeJob(job));
  });

  it('refuses to report a job that has not finished', () => {
    const job = new SchemaChangeJob({ table: 'app.users', alter: 'ADD COLUMN x INT', dryRun: false }, 'per-host', [host(M)]);
    expect(() => summarizeJob(job)).toThrow(IncompleteJobError);

    job.start(new Date(0));
    expect(() => summarizeJob(job)).toThrow(IncompleteJobError);
  });
});

describe('formatReport', () => {
  it('renders one line per host with its outcome', async () => {
    const job = await runJob(new FakeTool(h => (h.name === 'R1' ? { exitCode: 2, stderr: 'syntax error' } : {})));
    const lines = formatReport(summarizeJob(job)).split('\n');

    expect(lines[0]).toBe('Schema change job-42: FAILED');
    expect(lines).toContain('  ✗ R1 [replica] failed (1 attempt, 0ms)');
    expect(lines).toContain('      schema-change: R1: exit 2: syntax error');
    expect(lines).toContain('  · M [master] pending (0 attempts, not attempted)');
    expect(lines[lines.length - 1]).toBe('0 succeeded, 1 failed, 0 aborted, 1 not attempted');
  });
});

describe('exitCodeFor', () => {
  it('is nonzero for failed and aborted jobs', () => {
    expect(exitCodeFor('failed')).toBe(1);
    expect(exitCodeFor('aborted')).toBe(2);
  });
});
