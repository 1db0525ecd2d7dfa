import { parseSettings } from '../../../src/config/settings.js';
import { LauncherError, LauncherErrorCode } from '../../../src/shared/errors.js';

describe('parseSettings', () => {
  it('parses a full settings blob', () => {
    const settings = parseSettings({
      python_executable: '/usr/bin/python3.11',
      environment: { SERENA_LOG_LEVEL: 'debug' },
    });
    expect(settings).toEqual({
      python_executable: '/usr/bin/python3.11',
      environment: { SERENA_LOG_LEVEL: 'debug' },
    });
  });

  it('accepts an empty object', () => {
    expect(parseSettings({})).toEqual({});
  });

  it('treats a missing blob as no overrides', () => {
    expect(parseSettings(undefined)).toEqual({});
    expect(parseSettings(null)).toEqual({});
  });

  it('keeps an explicit null interpreter', () => {
    expect(parseSettings({ python_executable: null })).toEqual({ python_executable: null });
  });

  it('ignores unknown keys', () => {
    expect(parseSettings({ python_executable: 'python3', auto_install: true })).toEqual({
      python_executable: 'python3',
    });
  });

  it('preserves environment insertion order', () => {
    const settings = parseSettings({ environment: { ZETA: '1', ALPHA: '2' } });
    expect(Object.keys(settings.environment ?? {})).toEqual(['ZETA', 'ALPHA']);
  });

  it('rejects structurally invalid settings', () => {
    let caught: unknown;
    try {
      parseSettings({ environment: { PORT: 8080 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LauncherError);
    if (caught instanceof LauncherError) {
      expect(caught.code).toBe(LauncherErrorCode.CONFIGURATION_ERROR);
      expect(caught.message).toMatch(/^Invalid settings: environment\.PORT: /);
    }
  });

  it('rejects a non-object blob', () => {
    expect(() => parseSettings('python3')).toThrow(/^Invalid settings: \(root\): /);
  });
});
