import {
  createContextServerExtension,
  projectFromSettings,
  CONTEXT_SERVER_ID,
} from '../../src/extension.js';
import { LauncherError, LauncherErrorCode } from '../../src/shared/errors.js';
import { FakeRunner } from '../helpers/fake-runner.js';

function codeOf(fn: () => unknown): LauncherErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LauncherError) return err.code;
    throw err;
  }
  return undefined;
}

describe('createContextServerExtension', () => {
  it('resolves an override with its environment', () => {
    const extension = createContextServerExtension({
      platform: 'linux',
      runner: new FakeRunner(),
      fileExists: (p) => p === '/opt/py/bin/serena',
    });
    const project = projectFromSettings({
      [CONTEXT_SERVER_ID]: {
        python_executable: '/opt/py/bin/python3.11',
        environment: { SERENA_LOG_LEVEL: 'debug' },
        unknown_option: true,
      },
    });

    expect(extension.resolveLaunchCommand(CONTEXT_SERVER_ID, project)).toEqual({
      executable: '/opt/py/bin/serena',
      args: ['start-mcp-server'],
      env: [['SERENA_LOG_LEVEL', 'debug']],
    });
  });

  it('discovers an interpreter when the project has no settings', () => {
    const runner = new FakeRunner({
      'which python3.12': '/usr/bin/python3.12',
      '/usr/bin/python3.12 --version': 'Python 3.12.1',
    });
    const extension = createContextServerExtension({ platform: 'linux', runner, fileExists: () => false });

    expect(extension.resolveLaunchCommand(CONTEXT_SERVER_ID, projectFromSettings({}))).toEqual({
      executable: '/usr/bin/python3.12',
      args: ['-m', 'serena.cli', 'start-mcp-server'],
      env: [],
    });
  });

  it('passes the probe timeout to discovery', () => {
    const runner = new FakeRunner({
      'which python3.12': '/usr/bin/python3.12',
      '/usr/bin/python3.12 --version': 'Python 3.12.1',
    });
    const extension = createContextServerExtension({
      platform: 'linux',
      runner,
      probeTimeoutMs: 900,
      fileExists: () => false,
    });
    extension.resolveLaunchCommand(CONTEXT_SERVER_ID, projectFromSettings({}));
    expect(runner.timeouts).toEqual([900, 900]);
  });

  it('surfaces discovery failure when nothing is installed', () => {
    const extension = createContextServerExtension({ platform: 'linux', runner: new FakeRunner() });
    expect(codeOf(() => extension.resolveLaunchCommand(CONTEXT_SERVER_ID, projectFromSettings({})))).toBe(
      LauncherErrorCode.DISCOVERY_FAILED
    );
  });

  it('rejects an empty override', () => {
    const extension = createContextServerExtension({ platform: 'linux', runner: new FakeRunner() });
    const project = projectFromSettings({ [CONTEXT_SERVER_ID]: { python_executable: '' } });
    expect(codeOf(() => extension.resolveLaunchCommand(CONTEXT_SERVER_ID, project))).toBe(
      LauncherErrorCode.CONFIGURATION_ERROR
    );
  });

  it('rejects invalid settings', () => {
    const extension = createContextServerExtension({ platform: 'linux', runner: new FakeRunner() });
    const project = projectFromSettings({ [CONTEXT_SERVER_ID]: { environment: ['A=1'] } });
    expect(codeOf(() => extension.resolveLaunchCommand(CONTEXT_SERVER_ID, project))).toBe(
      LauncherErrorCode.CONFIGURATION_ERROR
    );
  });

  it('rejects unknown server ids', () => {
    const extension = createContextServerExtension({ platform: 'linux', runner: new FakeRunner() });
    expect(codeOf(() => extension.describeConfiguration('other-server'))).toBe(
      LauncherErrorCode.CONFIGURATION_ERROR
    );
    expect(codeOf(() => extension.resolveLaunchCommand('other-server', projectFromSettings({})))).toBe(
      LauncherErrorCode.CONFIGURATION_ERROR
    );
  });

  it('describes its configuration', () => {
    const description = createContextServerExtension().describeConfiguration(CONTEXT_SERVER_ID);
    expect(JSON.parse(description.defaultSettings)).toEqual({ python_executable: null });
  });
});
