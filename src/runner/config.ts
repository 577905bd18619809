import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_MARIADB_PORT, parseAddress } from './executor-interface.js';

const LocalExecutorSchema = z.object({
  type: z.literal('local'),
  defaultTimeoutMs: z.number().int().positive().default(120000),
});

const FleetExecutorSchema = z.object({
  type: z.literal('fleet'),
  region: z.string().min(1),
  maxConcurrency: z.number().int().positive().default(8),
  pollIntervalMs: z.number().int().positive().default(1000),
  defaultTimeoutMs: z.number().int().positive().default(120000),
});

const ExecutorSchema = z.discriminatedUnion('type', [LocalExecutorSchema, FleetExecutorSchema]);

// address accepts host[:port]; a port in both places must agree
const HostSchema = z
  .object({
    name: z.string().min(1).optional(),
    address: z.string().min(1),
    port: z.number().int().positive().max(65535).optional(),
    role: z.enum(['master', 'replica']),
    credentials: z.string().min(1).optional(),
    instanceId: z.string().min(1).optional(),
  })
  .transform((host, ctx) => {
    let parsed: { address: string; port: number };
    try {
      parsed = parseAddress(host.address, host.port ?? DEFAULT_MARIADB_PORT);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['address'], message: errorMessage(err) });
      return z.NEVER;
    }
    if (host.port !== undefined && host.port !== parsed.port) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['port'],
        message: `port ${host.port} conflicts with address ${host.address}`,
      });
      return z.NEVER;
    }
    return { ...host, ...parsed };
  });

const RetrySchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(5000),
  maxDelayMs: z.number().int().nonnegative().default(60000),
});

export const DEFAULT_RETRYABLE_PATTERNS = [
  'Lock wait timeout exceeded',
  'Deadlock found',
  'Lost connection to (MySQL|MariaDB) server',
  'server has gone away',
  'Too many connections',
];

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

export const SchemaChangePolicySchema = z.object({
  mode: z.enum(['per-host', 'replicated']).default('per-host'),
  maxLagSeconds: z.number().nonnegative().default(1),
  lagWaitMs: z.number().int().nonnegative().default(300000),
  lagPollIntervalMs: z.number().int().positive().default(5000),
  toolTimeoutMs: z.number().int().positive().default(6 * 60 * 60 * 1000),
  toolPath: z.string().min(1).default('pt-online-schema-change'),
  successExitCodes: z.array(z.number().int()).min(1).default([0]),
  retryableExitCodes: z.array(z.number().int()).default([75]),
  retryablePatterns: z
    .array(z.string().refine(isValidPattern, { message: 'not a valid regular expression' }))
    .default(DEFAULT_RETRYABLE_PATTERNS),
  retry: RetrySchema.default({}),
});

const LagSchema = z.object({
  checkTimeoutMs: z.number().int().positive().default(10000),
  clientPath: z.string().min(1).default('mysql'),
});

const OrchestrationConfigSchema = z.object({
  executor: ExecutorSchema,
  hosts: z.array(HostSchema).min(1).refine(
    hosts => hosts.filter(h => h.role === 'master').length === 1,
    { message: 'exactly one host must have role master' }
  ),
  lag: LagSchema.default({}),
  schemaChange: SchemaChangePolicySchema.default({}),
}).superRefine((config, ctx) => {
  if (config.executor.type !== 'fleet') return;
  config.hosts.forEach((host, index) => {
    if (!host.instanceId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hosts', index, 'instanceId'],
        message: 'required when executor.type is fleet',
      });
    }
  });
});

export type ExecutorConfig = z.infer<typeof ExecutorSchema>;
export type HostConfig = z.infer<typeof HostSchema>;
export type RetryPolicy = z.infer<typeof RetrySchema>;
export type SchemaChangePolicy = z.infer<typeof SchemaChangePolicySchema>;
export type LagConfig = z.infer<typeof LagSchema>;
export type OrchestrationConfig = z.infer<typeof OrchestrationConfigSchema>;

export function parseConfig(raw: unknown): OrchestrationConfig {
  const result = OrchestrationConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config:\n${errors}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): OrchestrationConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(yaml.parse(content));
}

export function defaultSchemaChangePolicy(overrides: Partial<SchemaChangePolicy> = {}): SchemaChangePolicy {
  return { ...SchemaChangePolicySchema.parse({}), ...overrides };
}
