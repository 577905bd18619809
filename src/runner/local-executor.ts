import { spawn } from 'child_process';
import type { CommandResult, CommandSpec, Host, RemoteExecutor } from './executor-interface.js';
import {
  TIMEOUT_EXIT_CODE,
  UNREACHABLE_EXIT_CODE,
  appendLine,
  hostKey,
  timeoutMarker,
} from './executor-interface.js';
import { InvalidTargetError } from './errors.js';

/**
 * Runs commands on the calling machine. Accepts exactly one target per call;
 * the host is the server the command acts on (e.g. through `-h`), not where it runs.
 */
export class LocalExecutor implements RemoteExecutor {
  readonly kind = 'local' as const;

  async execute(targets: readonly Host[], spec: CommandSpec): Promise<Map<string, CommandResult>> {
    if (targets.length !== 1) {
      throw new InvalidTargetError(
        `LocalExecutor accepts exactly one target, got ${targets.length}` +
          (targets.length > 1 ? ` (${targets.map(hostKey).join(', ')})` : '')
      );
    }

    const [host] = targets;
    const result = await this.run(host, spec);
    return new Map([[hostKey(host), result]]);
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command processes
  }

  private run(host: Host, spec: CommandSpec): Promise<CommandResult> {
    const startedAt = new Date();
    const started = Date.now();

    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (exitCode: number, timedOut: boolean, extraStderr?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve({
          host,
          exitCode,
          stdout: stdout.trim(),
          stderr: extraStderr ? appendLine(stderr.trim(), extraStderr) : stderr.trim(),
          durationMs: Date.now() - started,
          startedAt,
          timedOut,
        });
      };

      const proc = spawn(spec.program, [...spec.args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timeout = setTimeout(() => {
        proc.kill('SIGKILL');
        finish(TIMEOUT_EXIT_CODE, true, timeoutMarker(spec.timeoutMs));
      }, spec.timeoutMs);

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        finish(UNREACHABLE_EXIT_CODE, false, `failed to run ${spec.program}: ${err.message}`);
      });

      proc.on('close', (code, signal) => {
        if (code === null) {
          finish(UNREACHABLE_EXIT_CODE, false, `${spec.program} terminated by signal ${signal ?? 'unknown'}`);
          return;
        }
        finish(code, false);
      });
    });
  }
}
