export enum LauncherErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  DISCOVERY_FAILED = 'DISCOVERY_FAILED',
  PATH_RESOLUTION_FAILED = 'PATH_RESOLUTION_FAILED',
  PROBE_FAILED = 'PROBE_FAILED',
}

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LauncherErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LauncherError';
    this.code = code;
    this.context = context;
  }
}

export function isLauncherError(err: unknown, code?: LauncherErrorCode): err is LauncherError {
  return err instanceof LauncherError && (code === undefined || err.code === code);
}
