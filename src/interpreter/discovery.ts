import { logger } from '../shared/logger.js';
import { LauncherError, LauncherErrorCode, isLauncherError } from '../shared/errors.js';
import { DEFAULT_PROBE_TIMEOUT_MS, LocalRunner, succeeded } from '../shared/exec.js';
import type { CommandRunner } from '../shared/exec.js';
import type { Platform } from '../launch/types.js';
import { isPathAcceptable } from './path-validator.js';
import { isAcceptedVersion, describeAcceptedVersions } from './version-matcher.js';
import { PREFERRED_NAMES, FALLBACK_CANDIDATES } from './candidates.js';
import { resolveOnSearchPath } from './search-path.js';

export interface DiscoveryOptions {
  platform?: Platform;
  runner?: CommandRunner;
  probeTimeoutMs?: number;
  preferredNames?: readonly string[];
  fallbackCandidates?: readonly string[];
}

type Rejection = 'invalid-path' | 'not-found' | 'probe-failed' | 'wrong-version';

/**
 * Finds a Python interpreter the agent can run on.
 *
 * Every call re-enumerates candidates; nothing is cached between calls, so an
 * interpreter installed after a failed attempt is picked up on retry.
 */
export class InterpreterDiscovery {
  private readonly platform: Platform;
  private readonly runner: CommandRunner;
  private readonly probeTimeoutMs: number;
  private readonly preferredNames: readonly string[];
  private readonly fallbackCandidates: readonly string[];

  constructor(options: DiscoveryOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.runner = options.runner ?? new LocalRunner();
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.preferredNames = options.preferredNames ?? PREFERRED_NAMES;
    this.fallbackCandidates = options.fallbackCandidates ?? FALLBACK_CANDIDATES;
  }

  /** @throws LauncherError DISCOVERY_FAILED when no candidate is accepted */
  discover(): string {
    const attempted: string[] = [];

    for (const name of this.preferredNames) {
      attempted.push(name);
      const resolved = resolveOnSearchPath(name, this.runner, this.platform, this.probeTimeoutMs);
      if (resolved === null) {
        this.reject(name, 'not-found');
        continue;
      }
      if (this.accept(resolved)) return resolved;
    }

    for (const candidate of this.fallbackCandidates) {
      attempted.push(candidate);
      if (this.accept(candidate)) return candidate;
    }

    throw new LauncherError(
      LauncherErrorCode.DISCOVERY_FAILED,
      `${describeAcceptedVersions()} not found (tried: ${attempted.join(', ')}). ` +
        `Serena requires ${describeAcceptedVersions()}. Install a compatible version, ` +
        `or set "python_executable" in the serena-context-server settings to its full path.`,
      { attempted }
    );
  }

  private accept(candidate: string): boolean {
    if (!isPathAcceptable(candidate)) {
      this.reject(candidate, 'invalid-path');
      return false;
    }

    const version = this.probeVersion(candidate);
    if (version === null) {
      this.reject(candidate, 'probe-failed');
      return false;
    }
    if (!isAcceptedVersion(version)) {
      this.reject(candidate, 'wrong-version', version.trim());
      return false;
    }

    logger.debug({ candidate, version: version.trim() }, 'Accepted interpreter');
    return true;
  }

  private probeVersion(candidate: string): string | null {
    try {
      const result = this.runner.run(candidate, ['--version'], { timeoutMs: this.probeTimeoutMs });
      return succeeded(result) ? result.stdout : null;
    } catch (err) {
      if (isLauncherError(err, LauncherErrorCode.PROBE_FAILED)) return null;
      throw err;
    }
  }

  private reject(candidate: string, reason: Rejection, version?: string): void {
    logger.debug({ candidate, reason, version }, 'Rejected interpreter candidate');
  }
}
