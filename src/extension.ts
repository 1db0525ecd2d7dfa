import { LauncherError, LauncherErrorCode } from './shared/errors.js';
import type { CommandRunner } from './shared/exec.js';
import { parseSettings } from './config/settings.js';
import { describeConfiguration } from './config/description.js';
import type { ConfigurationDescription } from './config/description.js';
import { loadServerSettings } from './config/loader.js';
import { InterpreterDiscovery } from './interpreter/discovery.js';
import { synthesizeLaunchCommand } from './launch/synthesizer.js';
import type { FileExists, LaunchCommand, Platform } from './launch/types.js';

export const CONTEXT_SERVER_ID = 'serena-context-server';

/** Where the host keeps per-server settings for the current project. */
export interface Project {
  contextServerSettings(serverId: string): unknown;
}

export interface ContextServerExtension {
  resolveLaunchCommand(serverId: string, project: Project): LaunchCommand;
  describeConfiguration(serverId: string): ConfigurationDescription;
}

export interface ExtensionOptions {
  platform?: Platform;
  runner?: CommandRunner;
  probeTimeoutMs?: number;
  fileExists?: FileExists;
}

function assertServerId(serverId: string): void {
  if (serverId !== CONTEXT_SERVER_ID) {
    throw new LauncherError(
      LauncherErrorCode.CONFIGURATION_ERROR,
      `Unknown context server "${serverId}", expected "${CONTEXT_SERVER_ID}"`
    );
  }
}

/**
 * Entry point for hosts. Each call resolves from scratch; the returned object
 * holds only the options it was created with.
 */
export function createContextServerExtension(options: ExtensionOptions = {}): ContextServerExtension {
  const platform = options.platform ?? process.platform;

  return {
    resolveLaunchCommand(serverId, project) {
      assertServerId(serverId);
      const settings = parseSettings(project.contextServerSettings(serverId));
      const discovery = new InterpreterDiscovery({
        platform,
        runner: options.runner,
        probeTimeoutMs: options.probeTimeoutMs,
      });
      return synthesizeLaunchCommand(settings, platform, {
        discover: () => discovery.discover(),
        fileExists: options.fileExists,
      });
    },

    describeConfiguration(serverId) {
      assertServerId(serverId);
      return describeConfiguration();
    },
  };
}

/** A Project backed by a settings file on disk. */
export function projectFromSettingsFile(settingsPath: string): Project {
  return {
    contextServerSettings: (serverId) => loadServerSettings(settingsPath, serverId),
  };
}

/** A Project backed by an in-memory settings map, keyed by server id. */
export function projectFromSettings(settingsByServer: Record<string, unknown>): Project {
  return {
    contextServerSettings: (serverId) => settingsByServer[serverId],
  };
}
