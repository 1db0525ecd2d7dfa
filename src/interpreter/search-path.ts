import type { CommandRunner } from '../shared/exec.js';
import { succeeded } from '../shared/exec.js';
import { LauncherErrorCode, isLauncherError } from '../shared/errors.js';
import type { Platform } from '../launch/types.js';

/**
 * Resolve a bare executable name through the OS lookup command
 * (`which` on POSIX, `where` on Windows). Returns null when not found.
 */
export function resolveOnSearchPath(
  name: string,
  runner: CommandRunner,
  platform: Platform,
  timeoutMs?: number
): string | null {
  const lookup = platform === 'win32' ? 'where' : 'which';
  let stdout: string;
  try {
    const result = runner.run(lookup, [name], { timeoutMs });
    if (!succeeded(result)) return null;
    stdout = result.stdout;
  } catch (err) {
    if (isLauncherError(err, LauncherErrorCode.PROBE_FAILED)) return null;
    throw err;
  }

  // `where` lists every match; the first one is what the shell would run
  const first = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  return first ?? null;
}
