import type { CommandResult, CommandSpec, Host, RemoteExecutor } from '../runner/executor-interface.js';
import { createCommandSpec, hostKey } from '../runner/executor-interface.js';
import { InvalidTargetError } from '../runner/errors.js';
import type { SchemaChangeMode, SchemaChangeRequest } from './schema-change-job.js';

/**
 * The external schema change program as a capability: one invocation against
 * one host. The orchestrator only ever sees the returned result.
 */
export interface SchemaChangeTool {
  run(host: Host, spec: CommandSpec): Promise<CommandResult>;
}

export function executorTool(executor: RemoteExecutor): SchemaChangeTool {
  return {
    async run(host: Host, spec: CommandSpec): Promise<CommandResult> {
      const results = await executor.execute([host], spec);
      const result = results.get(hostKey(host));
      if (!result) {
        throw new InvalidTargetError(`${executor.kind} executor returned no result for ${hostKey(host)}`);
      }
      return result;
    },
  };
}

const TABLE_PATTERN = /^([A-Za-z0-9_$]+)\.([A-Za-z0-9_$]+)$/;
const ALTER_PREFIX = /^\s*ALTER\s+TABLE\b/i;

export function splitTable(table: string): { database: string; table: string } {
  const match = TABLE_PATTERN.exec(table);
  if (!match) {
    throw new Error(`Table must be given as database.table, got ${JSON.stringify(table)}`);
  }
  return { database: match[1], table: match[2] };
}

export function validateRequest(request: SchemaChangeRequest): void {
  splitTable(request.table);
  if (request.alter.trim() === '') {
    throw new Error('ALTER clause must not be empty');
  }
  if (ALTER_PREFIX.test(request.alter)) {
    throw new Error('Pass only the ALTER clause (e.g. "ADD COLUMN x INT"), without "ALTER TABLE <name>"');
  }
}

export interface ToolCommandOptions {
  toolPath: string;
  mode: SchemaChangeMode;
  maxLagSeconds: number;
  timeoutMs: number;
  successExitCodes: readonly number[];
}

export function buildSchemaChangeCommand(
  host: Host,
  request: SchemaChangeRequest,
  options: ToolCommandOptions
): CommandSpec {
  const { database, table } = splitTable(request.table);

  const dsn = [
    `h=${host.address}`,
    `P=${host.port}`,
    `D=${database}`,
    `t=${table}`,
    ...(host.credentials ? [`F=${host.credentials}`] : []),
  ].join(',');

  const args = [
    '--alter', request.alter.trim(),
    request.dryRun ? '--dry-run' : '--execute',
    '--max-lag', String(options.maxLagSeconds),
  ];

  if (options.mode === 'per-host') {
    // Each server is changed on its own; nothing may replicate downstream.
    args.push('--recursion-method=none', '--set-vars=sql_log_bin=0');
  }

  args.push(dsn);

  return createCommandSpec({
    program: options.toolPath,
    args,
    timeoutMs: options.timeoutMs,
    successExitCodes: options.successExitCodes,
  });
}
