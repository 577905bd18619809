import type { HostRole, RemoteExecutor } from '../runner/executor-interface.js';
import type { Topology } from '../topology/topology.js';

export interface CheckResult {
  name: string;
  node?: string;
  passed: boolean;
  message: string;
  durationMs: number;
}

export interface CheckContext {
  topology: Topology;
  executor: RemoteExecutor;
}

export interface Check {
  name: string;
  description: string;

  // Which host roles this check applies to.
  // If undefined or empty, the check covers every host.
  applicableRoles?: HostRole[];

  // Run the check and return results, usually one per applicable host.
  run(ctx: CheckContext): Promise<CheckResult[]>;
}
