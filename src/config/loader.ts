// Host settings loader. Reads a settings document (JSON or YAML; JSON parses
// as YAML) shaped the way editors nest MCP server settings:
//   context_servers:
//     serena-context-server:
//       settings: { python_executable: ..., environment: {...} }
// Only the `settings` blob of the requested server is returned; parseSettings
// validates it separately.
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function extractServerSettings(document: unknown, serverId: string): unknown {
  if (document === null || document === undefined) return undefined;
  if (!isRecord(document)) {
    throw new LauncherError(LauncherErrorCode.CONFIGURATION_ERROR, 'Settings document must be an object');
  }

  const servers = document['context_servers'];
  if (servers === undefined) return undefined;
  if (!isRecord(servers)) {
    throw new LauncherError(LauncherErrorCode.CONFIGURATION_ERROR, '"context_servers" must be an object');
  }

  const entry = servers[serverId];
  if (entry === undefined) return undefined;
  if (!isRecord(entry)) {
    throw new LauncherError(
      LauncherErrorCode.CONFIGURATION_ERROR,
      `"context_servers.${serverId}" must be an object`
    );
  }
  return entry['settings'];
}

/** Returns undefined when the file or the server entry does not exist. */
export function loadServerSettings(settingsPath: string, serverId: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(settingsPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug({ settingsPath }, 'No settings file, using defaults');
      return undefined;
    }
    throw err;
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new LauncherError(
      LauncherErrorCode.CONFIGURATION_ERROR,
      `Failed to parse settings at ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return extractServerSettings(document, serverId);
}
