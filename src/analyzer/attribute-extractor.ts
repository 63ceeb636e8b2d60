/**
 * Attribute extraction from Nix expressions.
 *
 * Finds `name = "value";` bindings by scanning the text line by line. The
 * scan reports every binding it sees; uniqueness is enforced separately by
 * `extractUnique` so that a duplicated attribute is a reportable data error.
 */

import { AmbiguousAttributeError, MissingAttributeError } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type AttributeScan =
  | { kind: 'found'; value: string }
  | { kind: 'missing' }
  | { kind: 'ambiguous'; values: string[] };

// ---------------------------------------------------------------------------
// scanAttribute
// ---------------------------------------------------------------------------

/** Characters that may appear inside a Nix identifier or attribute path. */
const IDENTIFIER_CHAR = /[A-Za-z0-9_'.-]/;

/**
 * Collect every quoted value bound to `attribute` in `text`.
 */
export function findAttributeValues(attribute: string, text: string): string[] {
  const values: string[] = [];

  for (const line of text.split('\n')) {
    let from = 0;
    for (;;) {
      const at = line.indexOf(attribute, from);
      if (at === -1) break;
      from = at + attribute.length;

      const before = at > 0 ? line.charAt(at - 1) : '';
      if (before !== '' && IDENTIFIER_CHAR.test(before)) continue;

      const value = readBindingValue(line, from);
      if (value !== null) values.push(value);
    }
  }

  return values;
}

/**
 * Scan `text` for `attribute` and classify the result.
 */
export function scanAttribute(attribute: string, text: string): AttributeScan {
  const values = findAttributeValues(attribute, text);
  const [first] = values;
  if (first === undefined) return { kind: 'missing' };
  if (values.length > 1) return { kind: 'ambiguous', values };
  return { kind: 'found', value: first };
}

/**
 * Return the single value bound to `attribute`.
 *
 * @throws MissingAttributeError when the attribute is not bound
 * @throws AmbiguousAttributeError when it is bound more than once
 */
export function extractUnique(attribute: string, text: string): string {
  const scan = scanAttribute(attribute, text);
  switch (scan.kind) {
    case 'found':
      return scan.value;
    case 'missing':
      throw new MissingAttributeError(attribute);
    case 'ambiguous':
      throw new AmbiguousAttributeError(attribute, scan.values);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Parse `<ws>=<ws>"<value>"<ws>;` starting right after the attribute name.
 * Returns null when the text at `start` is not such a binding.
 */
function readBindingValue(line: string, start: number): string | null {
  let i = skipWhitespace(line, start);
  if (line.charAt(i) !== '=') return null;
  // `==` is a comparison, not a binding
  if (line.charAt(i + 1) === '=') return null;

  i = skipWhitespace(line, i + 1);
  if (line.charAt(i) !== '"') return null;

  const valueStart = i + 1;
  let close = line.indexOf('"', valueStart);
  while (close !== -1) {
    if (line.charAt(close - 1) !== '\\') {
      const after = skipWhitespace(line, close + 1);
      if (line.charAt(after) === ';') return line.slice(valueStart, close);
    }
    close = line.indexOf('"', close + 1);
  }
  return null;
}

function skipWhitespace(line: string, from: number): number {
  let i = from;
  while (i < line.length && (line.charAt(i) === ' ' || line.charAt(i) === '\t')) i++;
  return i;
}
