export { LauncherError, LauncherErrorCode, isLauncherError } from './shared/errors.js';
export { LocalRunner, DEFAULT_PROBE_TIMEOUT_MS } from './shared/exec.js';
export type { CommandRunner, ExecResult, RunOptions } from './shared/exec.js';
export { isPathAcceptable } from './interpreter/path-validator.js';
export { isAcceptedVersion, ACCEPTED_VERSIONS } from './interpreter/version-matcher.js';
export { InterpreterDiscovery } from './interpreter/discovery.js';
export type { DiscoveryOptions } from './interpreter/discovery.js';
export { selectLaunchStrategy, SERVER_SUBCOMMAND, AGENT_MODULE } from './launch/strategy.js';
export { sanitizeWindowsPath } from './launch/sanitize.js';
export { synthesizeLaunchCommand } from './launch/synthesizer.js';
export type { SynthesizerDeps } from './launch/synthesizer.js';
export type { LaunchCommand, LaunchStrategy, EnvEntry, Platform } from './launch/types.js';
export { LauncherSettingsSchema, parseSettings } from './config/settings.js';
export type { LauncherSettings } from './config/settings.js';
export { loadServerSettings, extractServerSettings } from './config/loader.js';
export { describeConfiguration } from './config/description.js';
export type { ConfigurationDescription } from './config/description.js';
export {
  createContextServerExtension,
  projectFromSettings,
  projectFromSettingsFile,
  CONTEXT_SERVER_ID,
} from './extension.js';
export type { ContextServerExtension, Project, ExtensionOptions } from './extension.js';
