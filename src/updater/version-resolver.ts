/**
 * Version resolver — picks the greatest known release that does not cross
 * the ceiling implied by the target field.
 *
 * Flow:
 * 1. Parse the current version; silently drop unparsable known versions
 * 2. Derive the ceiling from the current release prefix
 * 3. Drop prereleases unless allowed
 * 4. Drop versions at or above the ceiling
 * 5. Return the greatest remaining version
 *
 * The result may be older than the current version; callers decide what a
 * downgrade means.
 */

import { TARGET_FIELD_INDEX, type TargetField } from '../schemas/config.schema.js';
import { NoEligibleVersionError } from '../utils/errors.js';
import {
  compareVersions,
  parseVersion,
  tryParseVersion,
  versionFromRelease,
  type VersionValue,
} from './version.js';

export interface ResolveOptions {
  allowPrereleases?: boolean;
}

// ---------------------------------------------------------------------------
// computeCeiling
// ---------------------------------------------------------------------------

/**
 * Exclusive upper bound for updates of `current` within `target`.
 *
 * Keeps the first `index(target)` release components and bumps the last one:
 * 2.5.3 / minor -> 3, 2.5.3 / patch -> 2.6. Major updates are unbounded.
 */
export function computeCeiling(current: VersionValue, target: TargetField): VersionValue | null {
  const prefix = current.release.slice(0, TARGET_FIELD_INDEX[target]);
  const last = prefix.pop();
  if (last === undefined) return null;
  return versionFromRelease([...prefix, last + 1]);
}

// ---------------------------------------------------------------------------
// resolveLatestVersion
// ---------------------------------------------------------------------------

/**
 * Resolve the best version of `currentVersion` among `knownVersions`.
 *
 * Versions with equal release vectors are interchangeable here; the first one
 * in `knownVersions` order wins.
 *
 * @throws InvalidVersionError when `currentVersion` is not a version
 * @throws NoEligibleVersionError when no candidate survives the filters, or
 *   with `currentIsLatest` set when the best candidate equals the current version
 */
export function resolveLatestVersion(
  currentVersion: string,
  target: TargetField,
  knownVersions: Iterable<string>,
  options: ResolveOptions = {},
): VersionValue {
  const current = parseVersion(currentVersion);
  const ceiling = computeCeiling(current, target);
  const allowPrereleases = options.allowPrereleases ?? false;

  let best: VersionValue | null = null;

  for (const raw of knownVersions) {
    const candidate = tryParseVersion(raw);
    if (candidate === null) continue;
    if (candidate.prerelease && !allowPrereleases) continue;
    if (ceiling !== null && compareVersions(candidate, ceiling) >= 0) continue;

    if (best === null || compareVersions(candidate, best) > 0) {
      best = candidate;
    }
  }

  if (best === null) {
    throw new NoEligibleVersionError(currentVersion, target);
  }
  if (compareVersions(best, current) === 0) {
    throw new NoEligibleVersionError(currentVersion, target, { currentIsLatest: true });
  }
  return best;
}
