#!/usr/bin/env node
import { Command } from 'commander';
import { createContextServerExtension, projectFromSettingsFile, CONTEXT_SERVER_ID } from './extension.js';
import { isLauncherError } from './shared/errors.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from './shared/exec.js';
import { logger } from './shared/logger.js';
import type { Platform } from './launch/types.js';

const PLATFORMS: readonly Platform[] = [
  'aix', 'android', 'darwin', 'freebsd', 'haiku', 'linux', 'openbsd', 'sunos', 'win32', 'cygwin', 'netbsd',
];

function parsePlatform(value: string): Platform {
  const match = PLATFORMS.find((p) => p === value);
  if (!match) throw new Error(`Unknown platform: ${value}`);
  return match;
}

function probeTimeoutFromEnv(): number {
  const raw = process.env['SERENA_PROBE_TIMEOUT_MS'];
  const parsed = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_PROBE_TIMEOUT_MS;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('serena-launch')
    .description('Resolve the command that starts Serena as an MCP server');

  program
    .command('resolve')
    .description('Print the launch command as JSON')
    .option('-s, --settings <file>', 'settings file (JSON or YAML)', 'settings.json')
    .option('--server-id <id>', 'context server id', CONTEXT_SERVER_ID)
    .option('--platform <platform>', 'target platform', process.platform)
    .action((opts: { settings: string; serverId: string; platform: string }) => {
      const extension = createContextServerExtension({
        platform: parsePlatform(opts.platform),
        probeTimeoutMs: probeTimeoutFromEnv(),
      });
      const command = extension.resolveLaunchCommand(opts.serverId, projectFromSettingsFile(opts.settings));
      process.stdout.write(JSON.stringify(command, null, 2) + '\n');
    });

  program
    .command('describe')
    .description('Print setup instructions, default settings and the settings schema')
    .option('--server-id <id>', 'context server id', CONTEXT_SERVER_ID)
    .action((opts: { serverId: string }) => {
      const description = createContextServerExtension().describeConfiguration(opts.serverId);
      process.stdout.write(JSON.stringify(description, null, 2) + '\n');
    });

  return program;
}

export function main(argv: string[]): number {
  try {
    buildProgram().parse(argv);
    return 0;
  } catch (err) {
    if (isLauncherError(err)) {
      logger.debug({ code: err.code, context: err.context }, 'Launch resolution failed');
      process.stderr.write(`error [${err.code}]: ${err.message}\n`);
    } else {
      process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
