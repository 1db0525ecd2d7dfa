import type { Platform } from './types.js';

/**
 * Strip the leading `/` the host's path layer prepends on Windows
 * (`/C:/Python312/python.exe`). No-op on every other platform.
 */
export function sanitizeWindowsPath(path: string, platform: Platform): string {
  if (platform !== 'win32') return path;
  return path.replace(/^\/+/, '');
}
