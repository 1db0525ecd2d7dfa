/** Supported runtime releases, most recent first. */
export const ACCEPTED_VERSIONS = ['3.12', '3.11'] as const;

export type AcceptedVersion = (typeof ACCEPTED_VERSIONS)[number];

const RUNTIME_NAME = 'Python';

/**
 * True when `python --version` output reports an accepted minor release.
 *
 * The prefix must end on a version boundary: "Python 3.11.7" and
 * "Python 3.11 (main, ...)" match, "Python 3.110.0" does not.
 */
export function isAcceptedVersion(versionOutput: string): boolean {
  const trimmed = versionOutput.trim();
  return ACCEPTED_VERSIONS.some((version) => {
    const prefix = `${RUNTIME_NAME} ${version}`;
    if (!trimmed.startsWith(prefix)) return false;
    const next = trimmed.charAt(prefix.length);
    return next === '' || next === '.' || /\s/.test(next);
  });
}

export function describeAcceptedVersions(): string {
  return ACCEPTED_VERSIONS.slice()
    .reverse()
    .map((v) => `${RUNTIME_NAME} ${v}`)
    .join(' or ');
}
