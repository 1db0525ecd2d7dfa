import path from 'path';
import { existsSync } from 'fs';
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';
import type { FileExists, LaunchStrategy, Platform } from './types.js';

export const AGENT_SCRIPT_NAME = 'serena';
export const AGENT_MODULE = 'serena.cli';
export const SERVER_SUBCOMMAND = 'start-mcp-server';

export interface StrategyOptions {
  platform?: Platform;
  fileExists?: FileExists;
}

function companionNames(platform: Platform): string[] {
  return platform === 'win32' ? [`${AGENT_SCRIPT_NAME}.exe`, AGENT_SCRIPT_NAME] : [AGENT_SCRIPT_NAME];
}

/**
 * Pick how to start the agent for a given interpreter.
 *
 * A `serena` console script next to the interpreter wins. When the package was
 * installed without entry points, fall back to `python -m serena.cli`.
 */
export function selectLaunchStrategy(interpreterPath: string, options: StrategyOptions = {}): LaunchStrategy {
  const platform = options.platform ?? process.platform;
  const fileExists = options.fileExists ?? existsSync;
  const paths = platform === 'win32' ? path.win32 : path.posix;

  const dir = paths.dirname(interpreterPath);
  if (interpreterPath.length === 0 || dir === interpreterPath) {
    throw new LauncherError(
      LauncherErrorCode.PATH_RESOLUTION_FAILED,
      `Could not determine Python directory for: ${interpreterPath}`,
      { interpreterPath }
    );
  }

  for (const name of companionNames(platform)) {
    const script = paths.join(dir, name);
    if (fileExists(script)) {
      return { strategy: 'script', executable: script, args: [SERVER_SUBCOMMAND] };
    }
  }

  return {
    strategy: 'module',
    executable: interpreterPath,
    args: ['-m', AGENT_MODULE, SERVER_SUBCOMMAND],
  };
}
