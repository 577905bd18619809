import {
  SSMClient,
  SendCommandCommand,
  GetCommandInvocationCommand,
  CancelCommandCommand,
  type SendCommandCommandInput,
  type SendCommandCommandOutput,
  type GetCommandInvocationCommandInput,
  type GetCommandInvocationCommandOutput,
  type CancelCommandCommandInput,
  type CancelCommandCommandOutput,
} from '@aws-sdk/client-ssm';
import type { FleetInvocation, FleetRunOptions, FleetService, FleetTarget } from './fleet-executor.js';
import { errorMessage } from './errors.js';
import { sleep } from '../lib/pool.js';

const RUN_SHELL_DOCUMENT = 'AWS-RunShellScript';
// SSM rejects delivery timeouts below 30 seconds
const MIN_DELIVERY_TIMEOUT_SEC = 30;
const DEFAULT_POLL_INTERVAL_MS = 1000;

const TERMINAL_STATUSES = new Set(['Success', 'Failed', 'TimedOut', 'Cancelled']);
const UNDELIVERABLE_DETAILS = new Set([
  'Undeliverable',
  'DeliveryTimedOut',
  'Terminated',
  'InvalidPlatform',
  'AccessDenied',
]);

/** The slice of the SSM API the fleet service needs. */
export interface SsmApi {
  sendCommand(input: SendCommandCommandInput): Promise<SendCommandCommandOutput>;
  getCommandInvocation(input: GetCommandInvocationCommandInput): Promise<GetCommandInvocationCommandOutput>;
  cancelCommand(input: CancelCommandCommandInput): Promise<CancelCommandCommandOutput>;
}

export function createSsmApi(client: SSMClient): SsmApi {
  return {
    sendCommand: input => client.send(new SendCommandCommand(input)),
    getCommandInvocation: input => client.send(new GetCommandInvocationCommand(input)),
    cancelCommand: input => client.send(new CancelCommandCommand(input)),
  };
}

export interface SsmFleetServiceOptions {
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class SsmFleetService implements FleetService {
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly api: SsmApi,
    options: SsmFleetServiceOptions = {},
    private readonly client?: SSMClient,
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? sleep;
  }

  static forRegion(region: string, options: SsmFleetServiceOptions = {}): SsmFleetService {
    const client = new SSMClient({ region });
    return new SsmFleetService(createSsmApi(client), options, client);
  }

  async run(target: FleetTarget, command: string, options: FleetRunOptions): Promise<FleetInvocation> {
    const timeoutSec = Math.max(1, Math.ceil(options.timeoutMs / 1000));

    let commandId: string | undefined;
    try {
      const sent = await this.api.sendCommand({
        DocumentName: RUN_SHELL_DOCUMENT,
        InstanceIds: [target.instanceId],
        TimeoutSeconds: Math.max(MIN_DELIVERY_TIMEOUT_SEC, timeoutSec),
        Parameters: {
          commands: [command],
          executionTimeout: [String(timeoutSec)],
        },
      });
      commandId = sent.Command?.CommandId;
    } catch (err) {
      return undeliverable(`SendCommand failed for ${target.instanceId}: ${errorMessage(err)}`);
    }

    if (!commandId) {
      return undeliverable(`SendCommand returned no command id for ${target.instanceId}`);
    }

    while (!options.signal.aborted) {
      let invocation: GetCommandInvocationCommandOutput | undefined;
      try {
        invocation = await this.api.getCommandInvocation({
          CommandId: commandId,
          InstanceId: target.instanceId,
        });
      } catch (err) {
        // The invocation is not visible for a short while after SendCommand
        if (!(err instanceof Error && err.name === 'InvocationDoesNotExist')) {
          return undeliverable(`GetCommandInvocation failed for ${target.instanceId}: ${errorMessage(err)}`);
        }
      }

      if (invocation?.Status && TERMINAL_STATUSES.has(invocation.Status)) {
        return toInvocation(invocation);
      }

      await this.sleep(this.pollIntervalMs);
    }

    await this.api.cancelCommand({ CommandId: commandId, InstanceIds: [target.instanceId] });
    return { status: 'timed-out', exitCode: null, stdout: '', stderr: `cancelled command ${commandId}` };
  }

  async close(): Promise<void> {
    this.client?.destroy();
  }
}

function toInvocation(output: GetCommandInvocationCommandOutput): FleetInvocation {
  const stdout = output.StandardOutputContent ?? '';
  const stderr = output.StandardErrorContent ?? '';
  const exitCode = output.ResponseCode !== undefined && output.ResponseCode >= 0 ? output.ResponseCode : null;

  if (output.StatusDetails && UNDELIVERABLE_DETAILS.has(output.StatusDetails)) {
    return { status: 'undeliverable', exitCode: null, stdout, stderr: stderr || output.StatusDetails };
  }

  switch (output.Status) {
    case 'Success':
      return { status: 'success', exitCode: exitCode ?? 0, stdout, stderr };
    case 'TimedOut':
    case 'Cancelled':
      return { status: 'timed-out', exitCode: null, stdout, stderr };
    default:
      return { status: 'failed', exitCode, stdout, stderr };
  }
}

function undeliverable(reason: string): FleetInvocation {
  return { status: 'undeliverable', exitCode: null, stdout: '', stderr: reason };
}
