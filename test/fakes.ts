import type {
  CommandResult,
  CommandSpec,
  Host,
  HostInit,
  RemoteExecutor,
} from '../src/runner/executor-interface.js';
import { createHost, hostKey } from '../src/runner/executor-interface.js';
import type { SchemaChangeTool } from '../src/actions/schema-change-tool.js';

export type Reply = Partial<Pick<CommandResult, 'exitCode' | 'stdout' | 'stderr' | 'timedOut'>>;

export function resultFor(host: Host, reply: Reply = {}): CommandResult {
  return {
    host,
    exitCode: reply.exitCode ?? 0,
    stdout: reply.stdout ?? '',
    stderr: reply.stderr ?? '',
    durationMs: 0,
    startedAt: new Date(0),
    timedOut: reply.timedOut ?? false,
  };
}

/** In-process executor answering every call through `handler`. */
export class FakeExecutor implements RemoteExecutor {
  readonly kind = 'fleet' as const;
  readonly calls: { host: Host; spec: CommandSpec }[] = [];

  constructor(private readonly handler: (host: Host, spec: CommandSpec) => Reply = () => ({})) {}

  async execute(targets: readonly Host[], spec: CommandSpec): Promise<Map<string, CommandResult>> {
    const results = new Map<string, CommandResult>();
    for (const host of targets) {
      this.calls.push({ host, spec });
      results.set(hostKey(host), resultFor(host, this.handler(host, spec)));
    }
    return results;
  }

  async close(): Promise<void> {}
}

/** Executor whose lag query reports the configured lag per host name. */
export function lagExecutor(lagByName: Record<string, number | null | (() => number | null)>): FakeExecutor {
  return new FakeExecutor(host => {
    const entry = lagByName[host.name];
    const lag = entry === undefined ? 0 : typeof entry === 'function' ? entry() : entry;
    return { stdout: `*** 1. row ***\nSeconds_Behind_Master: ${lag === null ? 'NULL' : lag}\n` };
  });
}

export class FakeTool implements SchemaChangeTool {
  readonly calls: { host: Host; spec: CommandSpec }[] = [];

  constructor(private readonly handler: (host: Host, attempt: number) => Reply = () => ({})) {}

  async run(host: Host, spec: CommandSpec): Promise<CommandResult> {
    this.calls.push({ host, spec });
    const attempt = this.calls.filter(c => hostKey(c.host) === hostKey(host)).length;
    return resultFor(host, this.handler(host, attempt));
  }

  hostsCalled(): string[] {
    return this.calls.map(c => c.host.name);
  }
}

/** Clock whose sleep advances time instantly. */
export function fakeClock(start = 1_000_000): {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  slept: number[];
} {
  let current = start;
  const slept: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      slept.push(ms);
      current += ms;
    },
    slept,
  };
}

export const M: HostInit = { name: 'M', address: '10.0.0.1', role: 'master', instanceId: 'i-master' };
export const R1: HostInit = { name: 'R1', address: '10.0.0.2', role: 'replica', instanceId: 'i-r1' };
export const R2: HostInit = { name: 'R2', address: '10.0.0.3', role: 'replica', instanceId: 'i-r2' };

export function host(init: HostInit): Host {
  return createHost(init);
}

export interface ServerState {
  lag?: number | null;
  /** Master coordinates executed so far (replicas). */
  executed?: [string, number];
  /** Current binlog coordinates (master); absent means binary logging is off. */
  binlog?: [string, number];
  down?: boolean;
}

/** Executor answering SHOW MASTER STATUS and SHOW SLAVE STATUS per host name. */
export function replicationExecutor(states: Record<string, ServerState>): FakeExecutor {
  return new FakeExecutor((host, spec) => {
    const state = states[host.name] ?? {};
    if (state.down) {
      return { exitCode: 1, stderr: "ERROR 2003 (HY000): Can't connect to MariaDB server" };
    }
    if (spec.args.includes('SHOW MASTER STATUS\\G')) {
      return {
        stdout: state.binlog
          ? `*** 1. row ***\n            File: ${state.binlog[0]}\n        Position: ${state.binlog[1]}\n    Binlog_Do_DB: \n`
          : '',
      };
    }
    const [file, position] = state.executed ?? ['mysql-bin.000001', 4];
    const lag = state.lag === undefined ? 0 : state.lag;
    return {
      stdout: [
        '*** 1. row ***',
        '        Slave_IO_Running: Yes',
        `   Relay_Master_Log_File: ${file}`,
        `     Exec_Master_Log_Pos: ${position}`,
        `   Seconds_Behind_Master: ${lag === null ? 'NULL' : lag}`,
      ].join('\n'),
    };
  });
}
