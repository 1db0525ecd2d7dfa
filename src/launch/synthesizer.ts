import { logger } from '../shared/logger.js';
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';
import type { LauncherSettings } from '../config/settings.js';
import { InterpreterDiscovery } from '../interpreter/discovery.js';
import { sanitizeWindowsPath } from './sanitize.js';
import { selectLaunchStrategy } from './strategy.js';
import type { EnvEntry, FileExists, LaunchCommand, Platform } from './types.js';

export interface SynthesizerDeps {
  /** Interpreter lookup used when no override is configured. */
  discover?: () => string;
  fileExists?: FileExists;
}

/**
 * Build the command that starts Serena as an MCP server.
 *
 * A `python_executable` override is used verbatim; only auto-discovered
 * interpreters go through path and version validation. Nothing is installed.
 */
export function synthesizeLaunchCommand(
  settings: LauncherSettings,
  platform: Platform,
  deps: SynthesizerDeps = {}
): LaunchCommand {
  const override = settings.python_executable;
  const discover = deps.discover ?? (() => new InterpreterDiscovery({ platform }).discover());
  const interpreter = typeof override === 'string' ? override : discover();

  if (interpreter.length === 0) {
    throw new LauncherError(
      LauncherErrorCode.CONFIGURATION_ERROR,
      'Python executable path cannot be empty',
      { python_executable: override }
    );
  }

  const sanitized = sanitizeWindowsPath(interpreter, platform);
  const { strategy, executable, args } = selectLaunchStrategy(sanitized, {
    platform,
    fileExists: deps.fileExists,
  });

  const env: EnvEntry[] = Object.entries(settings.environment ?? {}).map(
    ([name, value]): EnvEntry => [name, value]
  );

  logger.info(
    { executable, strategy, override: typeof override === 'string', envCount: env.length },
    'Resolved Serena launch command'
  );

  return Object.freeze({
    executable,
    args: Object.freeze([...args]),
    env: Object.freeze(env.map((entry) => Object.freeze(entry))),
  });
}
