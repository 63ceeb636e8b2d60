/**
 * Unit tests for the version resolver and ceiling computation.
 */

import { describe, it, expect } from 'vitest';
import { computeCeiling, resolveLatestVersion } from '../src/updater/version-resolver.js';
import { parseVersion } from '../src/updater/version.js';
import {
  InvalidVersionError,
  NoEligibleVersionError,
  UpdateErrorCode,
} from '../src/utils/errors.js';

// ---------------------------------------------------------------------------
// computeCeiling
// ---------------------------------------------------------------------------

describe('computeCeiling', () => {
  it('should not bound major updates', () => {
    expect(computeCeiling(parseVersion('2.5.3'), 'major')).toBeNull();
  });

  it('should bump the major component for minor updates', () => {
    expect(computeCeiling(parseVersion('2.5.3'), 'minor')?.release).toEqual([3]);
  });

  it('should bump the minor component for patch updates', () => {
    expect(computeCeiling(parseVersion('2.5.3'), 'patch')?.release).toEqual([2, 6]);
  });

  it('should use the available prefix when the release is short', () => {
    expect(computeCeiling(parseVersion('2'), 'patch')?.release).toEqual([3]);
  });
});

// ---------------------------------------------------------------------------
// resolveLatestVersion
// ---------------------------------------------------------------------------

describe('resolveLatestVersion', () => {
  it('should stay below the next major for minor updates', () => {
    const result = resolveLatestVersion('2.5.3', 'minor', ['2.5.4', '2.6.0', '3.0.0']);
    expect(result.raw).toBe('2.6.0');
  });

  it('should stay below the next minor for patch updates', () => {
    const result = resolveLatestVersion('2.5.3', 'patch', ['2.5.4', '2.5.10', '2.6.0']);
    expect(result.raw).toBe('2.5.10');
  });

  it('should accept any newer major for major updates', () => {
    const result = resolveLatestVersion('1.0.0', 'major', ['1.1.0', '10.0.0', '2.0.0']);
    expect(result.raw).toBe('10.0.0');
  });

  it('should silently skip unparsable versions', () => {
    const result = resolveLatestVersion('1.0.0', 'major', ['not-a-version', '1.0.1', 'latest']);
    expect(result.raw).toBe('1.0.1');
  });

  it('should mark the current version as latest when nothing newer is known', () => {
    expect(() => resolveLatestVersion('1.0.0', 'major', ['1.0.0'])).toThrow(
      NoEligibleVersionError,
    );
    expect(() => resolveLatestVersion('1.0.0', 'major', ['0.9.0', '1.0'])).toThrow(
      expect.objectContaining({ currentIsLatest: true }),
    );
  });

  it('should raise NoEligibleVersion when nothing parses', () => {
    expect(() => resolveLatestVersion('1.0.0', 'major', ['not-a-version'])).toThrow(
      expect.objectContaining({ code: UpdateErrorCode.NO_ELIGIBLE_VERSION, currentIsLatest: false }),
    );
  });

  it('should raise NoEligibleVersion when the release list is empty', () => {
    expect(() => resolveLatestVersion('1.0.0', 'minor', [])).toThrow(
      "no eligible version for 1.0.0 within target 'minor'",
    );
  });

  it('should raise NoEligibleVersion when every version is above the ceiling', () => {
    expect(() => resolveLatestVersion('1.4.0', 'patch', ['1.5.0', '2.0.0'])).toThrow(
      expect.objectContaining({ currentIsLatest: false }),
    );
  });

  it('should return an older release when it is the greatest below the ceiling', () => {
    const result = resolveLatestVersion('1.4.0', 'patch', ['1.3.0', '1.5.0', '2.0.0']);
    expect(result.raw).toBe('1.3.0');
  });

  it('should skip pre-releases unless allowed', () => {
    const versions = ['1.1.0', '2.0.0rc1'];
    expect(resolveLatestVersion('1.0.0', 'major', versions).raw).toBe('1.1.0');
    expect(
      resolveLatestVersion('1.0.0', 'major', versions, { allowPrereleases: true }).raw,
    ).toBe('2.0.0rc1');
  });

  it('should exclude pre-releases of the ceiling itself', () => {
    const result = resolveLatestVersion('2.5.3', 'minor', ['2.9.0', '3.0.0a1'], {
      allowPrereleases: true,
    });
    expect(result.raw).toBe('2.9.0');
  });

  it('should return the registry spelling of the chosen version', () => {
    expect(resolveLatestVersion('0.04.20', 'patch', ['0.04.21']).raw).toBe('0.04.21');
  });

  it('should keep the first of equally ordered versions', () => {
    expect(resolveLatestVersion('1.0', 'major', ['1.1', '1.1.0']).raw).toBe('1.1');
  });

  it('should accept any iterable of versions', () => {
    const known = new Set(['1.0.0', '1.2.0']);
    expect(resolveLatestVersion('1.0.0', 'minor', known).raw).toBe('1.2.0');
  });

  it('should reject an unparsable current version', () => {
    expect(() => resolveLatestVersion('garbage', 'major', ['1.0.0'])).toThrow(InvalidVersionError);
  });
});
