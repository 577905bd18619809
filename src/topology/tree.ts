import type { Host } from '../runner/executor-interface.js';
import { hostKey } from '../runner/executor-interface.js';
import { LagParseError, StatusParseError } from '../runner/errors.js';
import type { BinlogPosition } from './replication-status.js';
import { samePosition } from './replication-status.js';
import type { Topology } from './topology.js';

type Reading<T> = { ok: true; value: T } | { ok: false; error: string };

export interface ReplicaNode {
  host: Host;
  lag: Reading<number | null>;
  caughtUp: boolean;
}

export interface ReplicationTree {
  master: Host;
  binlog: Reading<BinlogPosition | null>;
  replicas: ReplicaNode[];
}

async function read<T>(work: Promise<T>): Promise<Reading<T>> {
  try {
    return { ok: true, value: await work };
  } catch (err) {
    if (err instanceof LagParseError || err instanceof StatusParseError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }
}

/** Sample the master's binlog position and every replica's lag and position. */
export async function describeTree(topology: Topology): Promise<ReplicationTree> {
  const master = topology.master();
  const binlog = await read(topology.masterStatus());
  const head = binlog.ok ? binlog.value : null;

  const replicas = await Promise.all(
    topology.replicas().map(async (replica): Promise<ReplicaNode> => {
      const [lag, position] = await Promise.all([
        read(topology.lag(replica).then(sample => sample.lagSeconds)),
        read(topology.replicaPosition(replica)),
      ]);
      const caughtUp = head !== null && position.ok && position.value !== null && samePosition(position.value, head);
      return { host: replica, lag, caughtUp };
    })
  );

  return { master, binlog, replicas };
}

function describeBinlog(binlog: ReplicationTree['binlog']): string {
  if (!binlog.ok) return `error (${binlog.error})`;
  return binlog.value === null ? 'off' : `${binlog.value.file}:${binlog.value.position}`;
}

function describeLag(lag: ReplicaNode['lag']): string {
  if (!lag.ok) return `error (${lag.error})`;
  return lag.value === null ? 'NULL' : `${lag.value}s`;
}

export function formatTree(tree: ReplicationTree): string {
  const lines = [`${tree.master.name} (${hostKey(tree.master)}), master, binlog: ${describeBinlog(tree.binlog)}`];
  const replicas = [...tree.replicas].sort((a, b) => a.host.name.localeCompare(b.host.name));
  for (const node of replicas) {
    lines.push(
      `+ ${node.host.name} (${hostKey(node.host)}), lag: ${describeLag(node.lag)}, caught up: ${node.caughtUp ? 'yes' : 'no'}`
    );
  }
  return lines.join('\n');
}
