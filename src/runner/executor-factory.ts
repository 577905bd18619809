import type { RemoteExecutor } from './executor-interface.js';
import type { ExecutorConfig } from './config.js';
import { LocalExecutor } from './local-executor.js';
import { FleetExecutor } from './fleet-executor.js';
import { SsmFleetService } from './ssm-fleet-service.js';
import type { Logger } from '../lib/log.js';

export function createExecutor(config: ExecutorConfig, logger?: Logger): RemoteExecutor {
  switch (config.type) {
    case 'local':
      return new LocalExecutor();
    case 'fleet':
      return new FleetExecutor(
        SsmFleetService.forRegion(config.region, { pollIntervalMs: config.pollIntervalMs }),
        { maxConcurrency: config.maxConcurrency, logger }
      );
  }
}
