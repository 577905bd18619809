/**
 * Error taxonomy shared by the executors, the topology and the orchestrator.
 *
 * `retryable` tells the orchestrator whether its retry policy applies. Misuse
 * errors (InvalidTargetError, IncompleteJobError, InvalidTransitionError) are
 * never retried and propagate to the caller.
 */

export abstract class FleetOscError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTargetError extends FleetOscError {
  readonly retryable = false;
}

export class TimeoutError extends FleetOscError {
  readonly retryable = true;

  constructor(message: string, readonly budgetMs: number) {
    super(message);
  }
}

export class TransientCommandFailure extends FleetOscError {
  readonly retryable = true;

  constructor(message: string, readonly exitCode: number | null) {
    super(message);
  }
}

export class NonRetryableCommandFailure extends FleetOscError {
  readonly retryable = false;

  constructor(message: string, readonly exitCode: number | null) {
    super(message);
  }
}

export class LagParseError extends FleetOscError {
  // Surfaced as a transient condition: the host is treated as unhealthy.
  readonly retryable = true;

  constructor(message: string, readonly output: string) {
    super(message);
  }
}

/** Replication or binary log status output that could not be read. */
export class StatusParseError extends FleetOscError {
  readonly retryable = true;

  constructor(message: string, readonly output: string) {
    super(message);
  }
}

export class IncompleteJobError extends FleetOscError {
  readonly retryable = false;
}

export class InvalidTransitionError extends FleetOscError {
  readonly retryable = false;
}

export class ConfigError extends FleetOscError {
  readonly retryable = false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
