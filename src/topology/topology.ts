/**
 * Replication topology: one master and zero or more replicas, in inventory order.
 *
 * Reads go to an immutable snapshot and never block. Role updates (for external
 * failover tooling) swap the snapshot under a mutex so concurrent updates apply
 * one at a time and a lag poll always sees a consistent master.
 */

import type { CommandResult, Host, HostInit, RemoteExecutor } from '../runner/executor-interface.js';
import { createCommandSpec, createHost, hostKey, withRole } from '../runner/executor-interface.js';
import { InvalidTargetError, LagParseError, StatusParseError } from '../runner/errors.js';
import { parseLagOutput, isWithinLag } from '../checks/replica-lag.js';
import type { BinlogPosition } from './replication-status.js';
import { parseMasterStatus, parseReplicaPosition, samePosition } from './replication-status.js';
import { Mutex } from '../lib/mutex.js';

export interface LagSample {
  readonly host: Host;
  /** null: replication stopped or unknown. Never read as zero. */
  readonly lagSeconds: number | null;
  readonly sampledAt: Date;
}

export interface TopologyOptions {
  lagCheckTimeoutMs?: number;
  mysqlClient?: string;
}

interface Snapshot {
  readonly master: Host;
  readonly replicas: readonly Host[];
  readonly order: readonly string[];
}

const DEFAULT_LAG_CHECK_TIMEOUT_MS = 10000;
const REPLICA_STATUS_QUERY = 'SHOW SLAVE STATUS\\G';
const MASTER_STATUS_QUERY = 'SHOW MASTER STATUS\\G';

export class Topology {
  private snapshot: Snapshot;
  private readonly roleMutex = new Mutex();
  private readonly lagCheckTimeoutMs: number;
  private readonly mysqlClient: string;

  constructor(
    hosts: readonly (Host | HostInit)[],
    private readonly executor: RemoteExecutor,
    options: TopologyOptions = {},
  ) {
    this.snapshot = buildSnapshot(hosts.map(h => createHost(h)));
    this.lagCheckTimeoutMs = options.lagCheckTimeoutMs ?? DEFAULT_LAG_CHECK_TIMEOUT_MS;
    this.mysqlClient = options.mysqlClient ?? 'mysql';
  }

  master(): Host {
    return this.snapshot.master;
  }

  replicas(): readonly Host[] {
    return this.snapshot.replicas;
  }

  /** Every host in inventory order. */
  hosts(): readonly Host[] {
    const { master, replicas, order } = this.snapshot;
    const byKey = new Map([master, ...replicas].map((h): [string, Host] => [hostKey(h), h]));
    return order.flatMap(key => byKey.get(key) ?? []);
  }

  find(key: string): Host | undefined {
    return this.hosts().find(h => hostKey(h) === key);
  }

  isMaster(host: Pick<Host, 'address' | 'port'>): boolean {
    return hostKey(this.snapshot.master) === hostKey(host);
  }

  async lag(host: Host): Promise<LagSample> {
    const member = this.member(host);

    if (this.isMaster(member)) {
      return { host: member, lagSeconds: 0, sampledAt: new Date() };
    }

    const result = await this.query(member, REPLICA_STATUS_QUERY);
    const sampledAt = new Date();

    if (!result || result.exitCode !== 0) {
      return { host: member, lagSeconds: null, sampledAt };
    }

    try {
      return { host: member, lagSeconds: parseLagOutput(result.stdout), sampledAt };
    } catch (err) {
      if (err instanceof LagParseError) {
        throw new LagParseError(`${member.name}: ${err.message}`, err.output);
      }
      throw err;
    }
  }

  /** Current binary log coordinates of the master; null when binlog is off or the query fails. */
  async masterStatus(): Promise<BinlogPosition | null> {
    const master = this.master();
    const result = await this.query(master, MASTER_STATUS_QUERY);
    if (!result || result.exitCode !== 0) {
      return null;
    }
    return attributed(master, () => parseMasterStatus(result.stdout));
  }

  /** Master coordinates the replica has executed up to; null when it is not replicating. */
  async replicaPosition(host: Host): Promise<BinlogPosition | null> {
    const member = this.member(host);
    const result = await this.query(member, REPLICA_STATUS_QUERY);
    if (!result || result.exitCode !== 0) {
      return null;
    }
    return attributed(member, () => parseReplicaPosition(result.stdout));
  }

  /**
   * True when the replica has executed exactly up to the master's current
   * binlog position. Only meaningful once writes on the master have stopped;
   * use lag() while they are ongoing. Any missing or unreadable status is false.
   */
  async caughtUpToMaster(host: Host): Promise<boolean> {
    const member = this.member(host);
    if (this.isMaster(member)) {
      throw new InvalidTargetError(`${member.name} is the master; only replicas can catch up to it`);
    }

    try {
      const [replica, master] = await Promise.all([this.replicaPosition(member), this.masterStatus()]);
      return replica !== null && master !== null && samePosition(replica, master);
    } catch (err) {
      if (err instanceof StatusParseError) {
        return false;
      }
      throw err;
    }
  }

  async replicaLag(): Promise<LagSample[]> {
    return Promise.all(this.replicas().map(replica => this.lag(replica)));
  }

  async isHealthy(host: Host, maxLagSeconds: number): Promise<boolean> {
    try {
      return isWithinLag(await this.lag(host), maxLagSeconds);
    } catch (err) {
      if (err instanceof LagParseError) {
        return false;
      }
      throw err;
    }
  }

  private member(host: Pick<Host, 'address' | 'port'>): Host {
    const member = this.find(hostKey(host));
    if (!member) {
      throw new InvalidTargetError(`Host ${hostKey(host)} is not part of this topology`);
    }
    return member;
  }

  private async query(member: Host, sql: string): Promise<CommandResult | undefined> {
    const spec = createCommandSpec({
      program: this.mysqlClient,
      args: [
        ...(member.credentials ? [`--defaults-file=${member.credentials}`] : []),
        '-h', member.address,
        '-P', String(member.port),
        '--batch',
        '-e', sql,
      ],
      timeoutMs: this.lagCheckTimeoutMs,
    });
    const results = await this.executor.execute([member], spec);
    return results.get(hostKey(member));
  }

  /**
   * Record a failover: `host` becomes the master, the previous master takes
   * its place among the replicas.
   */
  async promote(host: Pick<Host, 'address' | 'port'>): Promise<Host> {
    return this.roleMutex.withLock(() => {
      const key = hostKey(host);
      const current = this.snapshot;
      if (hostKey(current.master) === key) {
        return current.master;
      }

      const index = current.replicas.findIndex(r => hostKey(r) === key);
      if (index === -1) {
        throw new InvalidTargetError(`Host ${key} is not a replica in this topology`);
      }

      const promoted = withRole(current.replicas[index], 'master');
      const demoted = withRole(current.master, 'replica');
      const replicas = current.replicas.map((r, i) => (i === index ? demoted : r));

      this.snapshot = Object.freeze({
        master: promoted,
        replicas: Object.freeze(replicas),
        order: current.order,
      });
      return promoted;
    });
  }
}

function attributed<T>(host: Host, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof StatusParseError) {
      throw new StatusParseError(`${host.name}: ${err.message}`, err.output);
    }
    throw err;
  }
}

function buildSnapshot(hosts: readonly Host[]): Snapshot {
  const seen = new Set<string>();
  for (const host of hosts) {
    const key = hostKey(host);
    if (seen.has(key)) {
      throw new InvalidTargetError(`Duplicate host ${key} in topology`);
    }
    seen.add(key);
  }

  const masters = hosts.filter(h => h.role === 'master');
  if (masters.length !== 1) {
    throw new InvalidTargetError(`Topology requires exactly one master, found ${masters.length}`);
  }

  return Object.freeze({
    master: masters[0],
    replicas: Object.freeze(hosts.filter(h => h.role === 'replica')),
    order: Object.freeze(hosts.map(hostKey)),
  });
}
