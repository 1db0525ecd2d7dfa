export const MAX_PATH_LENGTH = 1000;

/** Roots whose executables are trusted even without "python" in the name. */
export const TRUSTED_ROOTS: readonly string[] = [
  '/usr/',
  '/opt/',
  '/bin/',
  '/home/',
  'C:\\Program Files\\',
  'C:\\Python',
];

/**
 * Gate applied to every auto-discovered interpreter before it is spawned.
 * Lookup output and fixed candidate lists both pass through here, so a
 * poisoned PATH entry or a malformed value never reaches process creation.
 */
export function isPathAcceptable(candidate: string): boolean {
  if (candidate.length === 0 || candidate.length >= MAX_PATH_LENGTH) return false;
  if (candidate.includes('\0')) return false;
  if (candidate.includes('..')) return false;
  if (candidate.includes('//') || candidate.includes('\\\\')) return false;

  if (candidate.toLowerCase().includes('python')) return true;
  return TRUSTED_ROOTS.some((root) => candidate.startsWith(root));
}
