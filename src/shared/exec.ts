// Short-lived child processes only: version probes and executable lookups.
// The long-running agent is never spawned here; the host owns that process.
import execa from 'execa';
import { LauncherError, LauncherErrorCode } from './errors.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  failed: boolean;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
}

/** Synchronous command runner; swap in a fake for tests. */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): ExecResult;
}

export class LocalRunner implements CommandRunner {
  run(command: string, args: string[], options?: RunOptions): ExecResult {
    try {
      const result = execa.sync(command, args, {
        env: options?.env,
        timeout: options?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
        reject: false,
      });
      return {
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        // execa leaves exitCode unset when the process never started
        exitCode: result.exitCode ?? -1,
        failed: result.failed,
        timedOut: result.timedOut,
      };
    } catch (err) {
      throw new LauncherError(LauncherErrorCode.PROBE_FAILED, `Command failed to spawn: ${command}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

export function succeeded(result: ExecResult): boolean {
  return !result.failed && !result.timedOut && result.exitCode === 0;
}
