import { ACCEPTED_VERSIONS } from './version-matcher.js';

/** Bare names looked up on PATH first. */
export const PREFERRED_NAMES: readonly string[] = ACCEPTED_VERSIONS.map((v) => `python${v}`);

const INSTALL_ROOTS = ['/opt/homebrew/bin', '/usr/local/bin', '/usr/bin'];

/**
 * Probed in order when PATH lookup finds nothing: versioned binaries under the
 * common install roots, then bare versioned names, then unversioned names.
 */
export const FALLBACK_CANDIDATES: readonly string[] = [
  ...INSTALL_ROOTS.flatMap((root) => PREFERRED_NAMES.map((name) => `${root}/${name}`)),
  ...PREFERRED_NAMES,
  'python3',
  'python',
];
