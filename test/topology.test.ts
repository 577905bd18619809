import { describe, expect, it } from 'vitest';
import { Topology } from '../src/topology/topology.js';
import { parseLagOutput } from '../src/checks/replica-lag.js';
import { parseMasterStatus, parseReplicaPosition, parseVerticalRow } from '../src/topology/replication-status.js';
import { InvalidTargetError, LagParseError, StatusParseError } from '../src/runner/errors.js';
import { FakeExecutor, M, R1, R2, host, lagExecutor, replicationExecutor } from './fakes.js';

describe('parseLagOutput', () => {
  it('reads Seconds_Behind_Master from vertical status output', () => {
    const output = [
      '*************************** 1. row ***************************',
      '                Slave_IO_State: Waiting for master to send event',
      '                   Master_Host: 10.0.0.1',
      '         Seconds_Behind_Master: 12',
      '               Master_Server_Id: 1',
    ].join('\n');
    expect(parseLagOutput(output)).toBe(12);
  });

  it('reads NULL as stopped', () => {
    expect(parseLagOutput('Seconds_Behind_Master: NULL')).toBeNull();
  });

  it('accepts a single bare value', () => {
    expect(parseLagOutput('0\n')).toBe(0);
    expect(parseLagOutput('1.5')).toBe(1.5);
    expect(parseLagOutput('NULL')).toBeNull();
  });

  it('treats empty output as not replicating', () => {
    expect(parseLagOutput('  \n')).toBeNull();
  });

  it('rejects anything else', () => {
    expect(() => parseLagOutput('Seconds_Behind_Master: soon')).toThrow(LagParseError);
    expect(() => parseLagOutput('ERROR 2003 (HY000): cannot connect')).toThrow(LagParseError);
    expect(() => parseLagOutput('-3')).toThrow(LagParseError);
  });
});

describe('Topology', () => {
  it('keeps inventory order for replicas and all hosts', () => {
    const topology = new Topology([R2, M, R1], lagExecutor({}));
    expect(topology.master().name).toBe('M');
    expect(topology.replicas().map(h => h.name)).toEqual(['R2', 'R1']);
    expect(topology.hosts().map(h => h.name)).toEqual(['R2', 'M', 'R1']);
  });

  it('requires exactly one master and unique hosts', () => {
    const executor = lagExecutor({});
    expect(() => new Topology([R1, R2], executor)).toThrow(/exactly one master/);
    expect(() => new Topology([M, { ...M, name: 'M2' }], executor)).toThrow(/Duplicate host/);
    expect(() => new Topology([M, { ...R1, role: 'master' }], executor)).toThrow(/found 2/);
  });

  it('reports zero lag for the master without running a command', async () => {
    const executor = lagExecutor({ M: 99 });
    const topology = new Topology([M, R1], executor);

    const sample = await topology.lag(host(M));

    expect(sample.lagSeconds).toBe(0);
    expect(executor.calls).toHaveLength(0);
  });

  it('runs the lag query against the replica through the executor', async () => {
    const executor = lagExecutor({ R1: 4 });
    const topology = new Topology([M, { ...R1, credentials: '/etc/mysql/osc.cnf' }], executor, {
      lagCheckTimeoutMs: 2500,
    });

    const sample = await topology.lag(host(R1));

    expect(sample.lagSeconds).toBe(4);
    expect(executor.calls).toHaveLength(1);
    const { spec } = executor.calls[0];
    expect(spec.program).toBe('mysql');
    expect(spec.args).toEqual([
      '--defaults-file=/etc/mysql/osc.cnf',
      '-h', '10.0.0.2',
      '-P', '3306',
      '--batch',
      '-e', 'SHOW SLAVE STATUS\\G',
    ]);
    expect(spec.timeoutMs).toBe(2500);
  });

  it('reports unknown lag when the query fails', async () => {
    const topology = new Topology([M, R1], new FakeExecutor(() => ({ exitCode: 1, stderr: 'Access denied' })));
    expect((await topology.lag(host(R1))).lagSeconds).toBeNull();
  });

  it('attributes unparseable output to the host', async () => {
    const topology = new Topology([M, R1], new FakeExecutor(() => ({ stdout: 'garbage' })));
    await expect(topology.lag(host(R1))).rejects.toThrow('R1: output is neither replication status nor a lag value');
  });

  it('rejects hosts outside the topology', async () => {
    const topology = new Topology([M], lagExecutor({}));
    await expect(topology.lag(host(R1))).rejects.toBeInstanceOf(InvalidTargetError);
  });

  it('judges health by threshold, NULL lag, and parse failures', async () => {
    const lags: Record<string, number | null> = { R1: 1, R2: null };
    const topology = new Topology([M, R1, R2], lagExecutor(lags));

    expect(await topology.isHealthy(host(M), 0)).toBe(true);
    expect(await topology.isHealthy(host(R1), 1)).toBe(true);
    expect(await topology.isHealthy(host(R1), 0.5)).toBe(false);
    expect(await topology.isHealthy(host(R2), 1000)).toBe(false);

    const broken = new Topology([M, R1], new FakeExecutor(() => ({ stdout: 'garbage' })));
    expect(await broken.isHealthy(host(R1), 1000)).toBe(false);
  });

  it('samples every replica', async () => {
    const topology = new Topology([M, R1, R2], lagExecutor({ R1: 3, R2: 0 }));
    const samples = await topology.replicaLag();
    expect(samples.map(s => [s.host.name, s.lagSeconds])).toEqual([
      ['R1', 3],
      ['R2', 0],
    ]);
  });

  it('promotes a replica and keeps inventory order', async () => {
    const topology = new Topology([M, R1, R2], lagExecutor({}));

    const promoted = await topology.promote(host(R2));

    expect(promoted.role).toBe('master');
    expect(topology.master().name).toBe('R2');
    expect(topology.replicas().map(h => [h.name, h.role])).toEqual([
      ['R1', 'replica'],
      ['M', 'replica'],
    ]);
    expect(topology.hosts().map(h => h.name)).toEqual(['M', 'R1', 'R2']);
  });

  it('applies concurrent role updates one after another', async () => {
    const topology = new Topology([M, R1, R2], lagExecutor({}));

    await Promise.all([topology.promote(host(R1)), topology.promote(host(R2))]);

    expect(topology.master().name).toBe('R2');
    expect(topology.replicas().map(h => h.name).sort()).toEqual(['M', 'R1']);
  });

  it('refuses to promote a host that is not a replica', async () => {
    const topology = new Topology([M, R1], lagExecutor({}));
    await expect(topology.promote({ address: '10.9.9.9', port: 3306 })).rejects.toBeInstanceOf(InvalidTargetError);
    expect((await topology.promote(host(M))).name).toBe('M');
  });

  it('reads the master binlog position with SHOW MASTER STATUS', async () => {
    const executor = replicationExecutor({ M: { binlog: ['mysql-bin.000012', 4567] } });
    const topology = new Topology([M, R1], executor);

    expect(await topology.masterStatus()).toEqual({ file: 'mysql-bin.000012', position: 4567 });
    expect(executor.calls.map(c => [c.host.name, c.spec.args[c.spec.args.length - 1]])).toEqual([
      ['M', 'SHOW MASTER STATUS\\G'],
    ]);
  });

  it('reports no master status when binary logging is off or the query fails', async () => {
    expect(await new Topology([M], replicationExecutor({ M: {} })).masterStatus()).toBeNull();
    expect(await new Topology([M], replicationExecutor({ M: { down: true } })).masterStatus()).toBeNull();
  });

  it('reads the executed master position of a replica', async () => {
    const topology = new Topology([M, R1], replicationExecutor({ R1: { executed: ['mysql-bin.000012', 4000] } }));
    expect(await topology.replicaPosition(host(R1))).toEqual({ file: 'mysql-bin.000012', position: 4000 });

    const idle = new Topology([M, R1], new FakeExecutor(() => ({ stdout: '' })));
    expect(await idle.replicaPosition(host(R1))).toBeNull();
  });

  it('attributes unreadable replica status to the host', async () => {
    const topology = new Topology([M, R1], new FakeExecutor(() => ({ stdout: 'Seconds_Behind_Master: 0' })));
    await expect(topology.replicaPosition(host(R1))).rejects.toThrow(
      new StatusParseError('R1: expected Relay_Master_Log_File and Exec_Master_Log_Pos in status output', '')
    );
  });

  it('is caught up only at exactly the master position', async () => {
    const topology = new Topology(
      [M, R1, R2],
      replicationExecutor({
        M: { binlog: ['mysql-bin.000012', 4567] },
        R1: { executed: ['mysql-bin.000012', 4567] },
        R2: { executed: ['mysql-bin.000012', 4000] },
      })
    );

    expect(await topology.caughtUpToMaster(host(R1))).toBe(true);
    expect(await topology.caughtUpToMaster(host(R2))).toBe(false);
  });

  it('is not caught up on another binlog file, a down master, or unreadable status', async () => {
    const rotated = replicationExecutor({
      M: { binlog: ['mysql-bin.000013', 4567] },
      R1: { executed: ['mysql-bin.000012', 4567] },
    });
    expect(await new Topology([M, R1], rotated).caughtUpToMaster(host(R1))).toBe(false);

    const masterDown = replicationExecutor({ M: { down: true }, R1: { executed: ['mysql-bin.000012', 4567] } });
    expect(await new Topology([M, R1], masterDown).caughtUpToMaster(host(R1))).toBe(false);

    const garbled = new FakeExecutor(() => ({ stdout: 'garbage' }));
    expect(await new Topology([M, R1], garbled).caughtUpToMaster(host(R1))).toBe(false);
  });

  it('does not ask whether the master caught up to itself', async () => {
    const topology = new Topology([M, R1], replicationExecutor({}));
    await expect(topology.caughtUpToMaster(host(M))).rejects.toBeInstanceOf(InvalidTargetError);
  });
});

describe('status output parsing', () => {
  it('reads only the first row', () => {
    const output = '*** 1. row ***\nFile: a.000001\nPosition: 10\n*** 2. row ***\nFile: b.000001\nPosition: 20';
    expect(Object.fromEntries(parseVerticalRow(output))).toEqual({ File: 'a.000001', Position: '10' });
    expect(parseMasterStatus(output)).toEqual({ file: 'a.000001', position: 10 });
  });

  it('treats empty output as no status and rejects a non-numeric position', () => {
    expect(parseMasterStatus('')).toBeNull();
    expect(parseReplicaPosition('\n')).toBeNull();
    expect(() => parseMasterStatus('File: a.000001\nPosition: soon')).toThrow(StatusParseError);
  });
});
