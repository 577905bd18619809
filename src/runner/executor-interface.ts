import { InvalidTargetError } from './errors.js';

export type HostRole = 'master' | 'replica';

export interface Host {
  readonly name: string;
  readonly address: string;
  readonly port: number;
  readonly role: HostRole;
  // Path to a MariaDB client defaults file (--defaults-file / DSN F=)
  readonly credentials?: string;
  // Fleet target id (SSM managed instance id)
  readonly instanceId?: string;
}

export interface HostInit {
  name?: string;
  address: string;
  port?: number;
  role: HostRole;
  credentials?: string;
  instanceId?: string;
}

export const DEFAULT_MARIADB_PORT = 3306;

export function createHost(init: HostInit): Host {
  const port = init.port ?? DEFAULT_MARIADB_PORT;
  return Object.freeze({
    name: init.name ?? (port === DEFAULT_MARIADB_PORT ? init.address : `${init.address}:${port}`),
    address: init.address,
    port,
    role: init.role,
    credentials: init.credentials,
    instanceId: init.instanceId,
  });
}

/**
 * Split `host[:port]` into address and port. IPv6 literals are not supported.
 */
export function parseAddress(text: string, defaultPort = DEFAULT_MARIADB_PORT): { address: string; port: number } {
  const parts = text.trim().split(':');
  if (parts.length > 2 || parts[0] === '') {
    throw new InvalidTargetError(`Invalid host address ${JSON.stringify(text)}, expected host[:port]`);
  }
  if (parts.length === 1) {
    return { address: parts[0], port: defaultPort };
  }

  const port = Number(parts[1]);
  if (!/^\d+$/.test(parts[1]) || port < 1 || port > 65535) {
    throw new InvalidTargetError(`Invalid port in host address ${JSON.stringify(text)}`);
  }
  return { address: parts[0], port };
}

/** Identity of a host: two handles with the same address and port are the same server. */
export function hostKey(host: Pick<Host, 'address' | 'port'>): string {
  return `${host.address}:${host.port}`;
}

export function withRole(host: Host, role: HostRole): Host {
  return host.role === role ? host : createHost({ ...host, role });
}

export interface CommandSpec {
  readonly program: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
  readonly successExitCodes: readonly number[];
}

export interface CommandSpecInit {
  program: string;
  args?: readonly string[];
  timeoutMs: number;
  successExitCodes?: readonly number[];
}

export function createCommandSpec(init: CommandSpecInit): CommandSpec {
  if (!init.program) {
    throw new Error('Command program must not be empty');
  }
  if (!Number.isFinite(init.timeoutMs) || init.timeoutMs <= 0) {
    throw new Error(`Command timeout must be a positive number of ms, got ${init.timeoutMs}`);
  }
  return Object.freeze({
    program: init.program,
    args: Object.freeze([...(init.args ?? [])]),
    timeoutMs: init.timeoutMs,
    successExitCodes: Object.freeze([...(init.successExitCodes ?? [0])]),
  });
}

// Sentinels sit below zero so they can never collide with a real exit status.
export const TIMEOUT_EXIT_CODE = -1;
export const UNREACHABLE_EXIT_CODE = -2;

export function timeoutMarker(timeoutMs: number): string {
  return `[timeout] command exceeded ${timeoutMs}ms`;
}

export function appendLine(text: string, line: string): string {
  return text ? `${text}\n${line}` : line;
}

export interface CommandResult {
  readonly host: Host;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly startedAt: Date;
  readonly timedOut: boolean;
}

export function isSuccess(result: CommandResult, spec: CommandSpec): boolean {
  return !result.timedOut && spec.successExitCodes.includes(result.exitCode);
}

export type ExecutorKind = 'local' | 'fleet';

/**
 * One attempt per target, fully observed. Implementations never retry and
 * resolve only once every target has completed or timed out.
 */
export interface RemoteExecutor {
  readonly kind: ExecutorKind;
  execute(targets: readonly Host[], spec: CommandSpec): Promise<Map<string, CommandResult>>;
  close(): Promise<void>;
}
