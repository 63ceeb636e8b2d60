/**
 * Unit tests for attribute extraction from Nix expressions.
 */

import { describe, it, expect } from 'vitest';
import {
  extractUnique,
  findAttributeValues,
  scanAttribute,
} from '../src/analyzer/attribute-extractor.js';
import {
  AmbiguousAttributeError,
  MissingAttributeError,
  UpdateErrorCode,
} from '../src/utils/errors.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const EXPRESSION = `{ lib, buildPythonPackage, fetchPypi }:

buildPythonPackage rec {
  pname = "requests-toolbelt";
  version = "1.0.0";

  src = fetchPypi {
    inherit pname version;
    hash = "sha256-placeholder";
  };

  meta.version = "ignored";
}
`;

// ---------------------------------------------------------------------------
// extractUnique
// ---------------------------------------------------------------------------

describe('extractUnique', () => {
  it('should return the single value of an attribute', () => {
    expect(extractUnique('pname', 'pname = "foo";')).toBe('foo');
  });

  it('should read attributes from a full expression', () => {
    expect(extractUnique('pname', EXPRESSION)).toBe('requests-toolbelt');
    expect(extractUnique('version', EXPRESSION)).toBe('1.0.0');
  });

  it('should raise AmbiguousAttribute when the attribute is bound twice', () => {
    expect(() => extractUnique('pname', 'pname = "foo"; pname = "bar";')).toThrow(
      AmbiguousAttributeError,
    );
  });

  it('should raise MissingAttribute when the attribute is not bound', () => {
    expect(() => extractUnique('pname', 'other = "x";')).toThrow(MissingAttributeError);
  });

  it('should carry the error code and attribute name', () => {
    try {
      extractUnique('version', 'pname = "foo";');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingAttributeError);
      expect(err).toMatchObject({
        code: UpdateErrorCode.MISSING_ATTRIBUTE,
        attribute: 'version',
        message: 'no value found for version',
      });
    }
  });
});

// ---------------------------------------------------------------------------
// scanAttribute
// ---------------------------------------------------------------------------

describe('scanAttribute', () => {
  it('should report found values', () => {
    expect(scanAttribute('version', EXPRESSION)).toEqual({ kind: 'found', value: '1.0.0' });
  });

  it('should report every value when ambiguous', () => {
    expect(scanAttribute('pname', 'pname = "foo";\npname = "bar";')).toEqual({
      kind: 'ambiguous',
      values: ['foo', 'bar'],
    });
  });

  it('should report missing values', () => {
    expect(scanAttribute('pname', '')).toEqual({ kind: 'missing' });
  });
});

// ---------------------------------------------------------------------------
// findAttributeValues
// ---------------------------------------------------------------------------

describe('findAttributeValues', () => {
  it('should ignore attributes that only end with the name', () => {
    const text = 'src_version = "2.0";\nversion = "1.0";\nmeta.version = "3.0";';
    expect(findAttributeValues('version', text)).toEqual(['1.0']);
  });

  it('should ignore inherit statements and comparisons', () => {
    const text = 'inherit pname version;\nok = version == "1.0";';
    expect(findAttributeValues('version', text)).toEqual([]);
  });

  it('should accept bindings without surrounding spaces', () => {
    expect(findAttributeValues('pname', 'pname="foo";')).toEqual(['foo']);
  });

  it('should require the terminating semicolon', () => {
    expect(findAttributeValues('pname', 'pname = "foo"')).toEqual([]);
  });

  it('should skip escaped quotes inside the value', () => {
    expect(findAttributeValues('pname', 'pname = "a\\"b";')).toEqual(['a\\"b']);
  });

  it('should keep interpolations verbatim', () => {
    expect(findAttributeValues('version', 'version = "${major}.1";')).toEqual(['${major}.1']);
  });
});
