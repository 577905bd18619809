#!/usr/bin/env tsx

import { parseArgs } from 'util';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { loadConfig } from './config.js';
import type { OrchestrationConfig, SchemaChangePolicy } from './config.js';
import { createExecutor } from './executor-factory.js';
import { createCommandSpec } from './executor-interface.js';
import type { RemoteExecutor } from './executor-interface.js';
import { errorMessage } from './errors.js';
import { Topology } from '../topology/topology.js';
import { describeTree, formatTree } from '../topology/tree.js';
import { runValidation } from '../checks/index.js';
import { connectivityCheck } from '../checks/connectivity.js';
import { isWithinLag } from '../checks/replica-lag.js';
import { SchemaChangeOrchestrator } from '../actions/schema-change.js';
import { executorTool } from '../actions/schema-change-tool.js';
import { exitCodeFor, formatReport, summarizeJob } from '../actions/report.js';
import { consoleLogger } from '../lib/log.js';

export { loadConfig, parseConfig } from './config.js';
export { createExecutor } from './executor-factory.js';
export { LocalExecutor } from './local-executor.js';
export { FleetExecutor } from './fleet-executor.js';
export { SsmFleetService } from './ssm-fleet-service.js';
export { Topology } from '../topology/topology.js';
export { describeTree, formatTree } from '../topology/tree.js';
export { SchemaChangeOrchestrator } from '../actions/schema-change.js';
export { SchemaChangeJob } from '../actions/schema-change-job.js';
export { summarizeJob, formatReport, exitCodeFor } from '../actions/report.js';
export * from './errors.js';
export type { CommandResult, CommandSpec, Host, RemoteExecutor } from './executor-interface.js';

export interface RunContext {
  config: OrchestrationConfig;
  executor: RemoteExecutor;
  topology: Topology;
}

/** Build one run's executor and topology from its configuration. */
export function createRunContext(config: OrchestrationConfig): RunContext {
  const executor = createExecutor(config.executor, consoleLogger);
  const topology = new Topology(config.hosts, executor, {
    lagCheckTimeoutMs: config.lag.checkTimeoutMs,
    mysqlClient: config.lag.clientPath,
  });
  return { config, executor, topology };
}

const USAGE = `
Usage: npx tsx src/runner [options] <command>

Options:
  -c, --config <path>       Path to topology config file (default: topology.yaml)
  -h, --help                Show this help message

Commands:
  check                     Verify every server answers a ping
  exec <command...>         Execute a command on every host
  lag                       Show replication lag of every replica
  tree                      Show the master's binlog position and each replica's lag
  validate                  Run pre-flight checks (connectivity, replica lag)
  schema-change             Run an online schema change across the topology
      --table <db.table>        Table to change (required)
      --alter <clause>          ALTER clause, e.g. "ADD COLUMN x INT" (required)
      --dry-run                 Pass --dry-run to the tool instead of --execute
      --max-lag <seconds>       Override schemaChange.maxLagSeconds
      --max-attempts <n>        Override schemaChange.retry.maxAttempts
      --mode <per-host|replicated>
      --json                    Print the report as JSON

Examples:
  npx tsx src/runner --config topology.yaml check
  npx tsx src/runner lag
  npx tsx src/runner schema-change --table app.users --alter "ADD COLUMN x INT" --dry-run
`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'topology.yaml' },
      help: { type: 'boolean', short: 'h' },
      table: { type: 'string' },
      alter: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      'max-lag': { type: 'string' },
      'max-attempts': { type: 'string' },
      mode: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const [command, ...args] = positionals;
  const context = createRunContext(loadConfig(values.config ?? 'topology.yaml'));

  let exitCode = 0;
  try {
    switch (command) {
      case 'check':
        exitCode = await checkConnectivity(context);
        break;

      case 'exec':
        if (args.length === 0) {
          console.error('Error: exec requires a command argument');
          exitCode = 1;
          break;
        }
        exitCode = await execOnAll(context, args);
        break;

      case 'lag':
        exitCode = await showLag(context);
        break;

      case 'tree':
        console.log(formatTree(await describeTree(context.topology)));
        break;

      case 'validate':
        exitCode = await validate(context);
        break;

      case 'schema-change': {
        if (!values.table || !values.alter) {
          console.error('Error: schema-change requires --table and --alter');
          exitCode = 1;
          break;
        }
        const policy = applyOverrides(context.config.schemaChange, {
          maxLag: values['max-lag'],
          maxAttempts: values['max-attempts'],
          mode: values.mode,
        });
        exitCode = await runSchemaChange(context, policy, {
          table: values.table,
          alter: values.alter,
          dryRun: values['dry-run'] ?? false,
        }, values.json ?? false);
        break;
      }

      default:
        console.error(`Unknown command: ${command}`);
        console.error('Run with --help for usage information');
        exitCode = 1;
    }
  } finally {
    await context.executor.close();
  }

  process.exit(exitCode);
}

function applyOverrides(
  policy: SchemaChangePolicy,
  overrides: { maxLag?: string; maxAttempts?: string; mode?: string }
): SchemaChangePolicy {
  const next: SchemaChangePolicy = { ...policy, retry: { ...policy.retry } };

  if (overrides.maxLag !== undefined) {
    const maxLag = Number(overrides.maxLag);
    if (!Number.isFinite(maxLag) || maxLag < 0) {
      throw new Error(`--max-lag must be a non-negative number, got ${overrides.maxLag}`);
    }
    next.maxLagSeconds = maxLag;
  }

  if (overrides.maxAttempts !== undefined) {
    const maxAttempts = Number(overrides.maxAttempts);
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`--max-attempts must be a positive integer, got ${overrides.maxAttempts}`);
    }
    next.retry.maxAttempts = maxAttempts;
  }

  if (overrides.mode !== undefined) {
    if (overrides.mode !== 'per-host' && overrides.mode !== 'replicated') {
      throw new Error(`--mode must be per-host or replicated, got ${overrides.mode}`);
    }
    next.mode = overrides.mode;
  }

  return next;
}

async function checkConnectivity(context: RunContext): Promise<number> {
  console.log('Checking connectivity to all hosts...\n');

  const results = await connectivityCheck.run({ topology: context.topology, executor: context.executor });
  for (const result of results) {
    console.log(`  ${result.passed ? '✓' : '✗'} ${result.node}: ${result.message}`);
  }

  console.log('');
  const allOk = results.every(r => r.passed);
  console.log(allOk ? 'All hosts reachable.' : 'Some hosts failed connectivity check.');
  return allOk ? 0 : 1;
}

async function execOnAll(context: RunContext, argv: string[]): Promise<number> {
  const [program, ...programArgs] = argv;
  const spec = createCommandSpec({
    program,
    args: programArgs,
    timeoutMs: context.config.executor.defaultTimeoutMs,
  });
  const hosts = context.topology.hosts();
  console.log(`Executing on ${hosts.length} host(s): ${argv.join(' ')}\n`);

  // The local backend takes one target per call
  const results = context.executor.kind === 'fleet'
    ? Array.from((await context.executor.execute(hosts, spec)).values())
    : await Promise.all(
        hosts.map(async host => Array.from((await context.executor.execute([host], spec)).values()))
      ).then(r => r.flat());

  let allOk = true;
  for (const result of results) {
    if (result.exitCode !== 0) allOk = false;
    console.log(`--- ${result.host.name} (exit ${result.exitCode}, ${result.durationMs}ms) ---`);
    if (result.stdout) console.log(result.stdout);
    if (result.stderr) console.log(`stderr: ${result.stderr}`);
    console.log('');
  }
  return allOk ? 0 : 1;
}

async function showLag(context: RunContext): Promise<number> {
  const { topology } = context;
  const maxLag = context.config.schemaChange.maxLagSeconds;
  console.log(`master: ${topology.master().name}`);

  let allOk = true;
  for (const replica of topology.replicas()) {
    try {
      const sample = await topology.lag(replica);
      const healthy = isWithinLag(sample, maxLag);
      if (!healthy) allOk = false;
      console.log(`  ${healthy ? '✓' : '✗'} ${replica.name}: ${sample.lagSeconds === null ? 'NULL (stopped or unknown)' : `${sample.lagSeconds}s`}`);
    } catch (err) {
      allOk = false;
      console.log(`  ✗ ${replica.name}: ${errorMessage(err)}`);
    }
  }
  return allOk ? 0 : 1;
}

async function validate(context: RunContext): Promise<number> {
  console.log('Running pre-flight checks...\n');
  const { failed, passed } = await runValidation(
    { topology: context.topology, executor: context.executor },
    {
      maxLagSeconds: context.config.schemaChange.maxLagSeconds,
      onResult: result => {
        const nodeInfo = result.node ? ` [${result.node}]` : '';
        console.log(`  ${result.passed ? '✓' : '✗'} ${result.name}${nodeInfo}: ${result.message} (${result.durationMs}ms)`);
      },
    }
  );
  console.log(`\n${passed} passed, ${failed} failed`);
  return failed > 0 ? 1 : 0;
}

async function runSchemaChange(
  context: RunContext,
  policy: SchemaChangePolicy,
  request: { table: string; alter: string; dryRun: boolean },
  json: boolean
): Promise<number> {
  const orchestrator = new SchemaChangeOrchestrator(
    context.topology,
    executorTool(context.executor),
    policy,
    { logger: consoleLogger }
  );
  const job = orchestrator.createJob(request);

  // First Ctrl-C stops at the next host boundary, the second exits right away
  const onInterrupt = (): void => {
    if (job.abortRequested) {
      console.error('\nSecond interrupt, exiting without waiting for the running host');
      process.exit(130);
    }
    console.error('\nAbort requested; finishing the running host first (interrupt again to exit)');
    job.requestAbort('interrupted by operator');
  };
  process.on('SIGINT', onInterrupt);

  try {
    await orchestrator.run(job);
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  const report = summarizeJob(job);
  console.log(json ? JSON.stringify(report, null, 2) : `\n${formatReport(report)}`);
  return exitCodeFor(report.status);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err) => {
    console.error('Error:', errorMessage(err));
    process.exit(1);
  });
}
