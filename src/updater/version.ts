/**
 * Version values for Python package releases.
 *
 * A version keeps the raw string it was parsed from (the registry's spelling
 * is what gets reported, e.g. "0.04.21" stays "0.04.21") together with its
 * numeric release vector. Ordering looks at the release vector only, so
 * "1.2", "1.2.0" and "1.2.0.post1" all compare equal.
 */

import { InvalidVersionError } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Data model
// ---------------------------------------------------------------------------

export interface VersionValue {
  readonly raw: string;
  /** Leading dot-separated integers, e.g. [2, 5, 3] for "2.5.3rc1" */
  readonly release: readonly number[];
  /** True when the version carries a pre-release or dev segment */
  readonly prerelease: boolean;
}

/**
 * PEP 440 version grammar (public version plus optional local label).
 */
const VERSION_PATTERN = new RegExp(
  '^\\s*v?' +
    '(?:(?<epoch>[0-9]+)!)?' +
    '(?<release>[0-9]+(?:\\.[0-9]+)*)' +
    '(?<pre>[-_.]?(?:alpha|a|beta|b|preview|pre|c|rc)[-_.]?[0-9]*)?' +
    '(?<post>-[0-9]+|[-_.]?(?:post|rev|r)[-_.]?[0-9]*)?' +
    '(?<dev>[-_.]?dev[-_.]?[0-9]*)?' +
    '(?:\\+[a-z0-9]+(?:[-_.][a-z0-9]+)*)?' +
    '\\s*$',
  'i',
);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a raw version string, or return null when it is not a version.
 */
export function tryParseVersion(raw: string): VersionValue | null {
  const match = VERSION_PATTERN.exec(raw);
  const release = match?.groups?.['release'];
  if (!match || release === undefined) return null;

  return {
    raw,
    release: release.split('.').map((part) => Number.parseInt(part, 10)),
    prerelease: match.groups?.['pre'] !== undefined || match.groups?.['dev'] !== undefined,
  };
}

/**
 * Parse a raw version string.
 *
 * @throws InvalidVersionError when `raw` has no recognizable release number
 */
export function parseVersion(raw: string): VersionValue {
  const version = tryParseVersion(raw);
  if (version === null) throw new InvalidVersionError(raw);
  return version;
}

/**
 * Build a final-release version directly from its components.
 */
export function versionFromRelease(release: readonly number[]): VersionValue {
  return { raw: release.join('.'), release: [...release], prerelease: false };
}

// ---------------------------------------------------------------------------
// Ordering and indexing
// ---------------------------------------------------------------------------

/**
 * Compare two versions by release vector, padding the shorter one with zeros.
 */
export function compareVersions(a: VersionValue, b: VersionValue): -1 | 0 | 1 {
  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i++) {
    const left = a.release[i] ?? 0;
    const right = b.release[i] ?? 0;
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
}

/**
 * The i-th release component.
 *
 * @throws RangeError when `index` is outside the release vector
 */
export function versionComponent(version: VersionValue, index: number): number {
  const component = Number.isInteger(index) && index >= 0 ? version.release[index] : undefined;
  if (component === undefined) {
    throw new RangeError(
      `release component ${index} out of range for ${version.raw} (${version.release.length} components)`,
    );
  }
  return component;
}
