/**
 * Inventory lookup — maps a package name and version back to the identifier
 * nixpkgs builds it under (e.g. "foo" 1.0.0 -> "python3.12-foo").
 *
 * The inventory is the output of `nix-env -qa`: one `<identifier>-<version>`
 * token per line. It is loaded once and shared read-only by every task.
 */

export interface Inventory {
  readonly lines: readonly string[];
  /** Lines containing any of these markers never match */
  readonly excludedMarkers: readonly string[];
}

export type IdentifierLookup =
  | { kind: 'found'; identifier: string; line: string }
  | { kind: 'absent' };

export function createInventory(text: string, excludedMarkers: readonly string[] = ['python2']): Inventory {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return Object.freeze({
    lines: Object.freeze(lines),
    excludedMarkers: Object.freeze([...excludedMarkers]),
  });
}

/**
 * Find the identifier of `pname` at `currentVersion`.
 *
 * The first line (in file order) containing `{pname}-{currentVersion}` and no
 * excluded marker wins, even when another identifier shares that infix. The
 * identifier is the line without its last `-`-separated segment.
 */
export function resolveIdentifier(
  pname: string,
  currentVersion: string,
  inventory: Inventory,
): IdentifierLookup {
  const needle = `${pname}-${currentVersion}`;

  const line = inventory.lines.find(
    (candidate) =>
      candidate.includes(needle) &&
      !inventory.excludedMarkers.some((marker) => candidate.includes(marker)),
  );
  if (line === undefined) return { kind: 'absent' };

  const cut = line.lastIndexOf('-');
  const identifier = cut === -1 ? '' : line.slice(0, cut);
  if (identifier.length === 0) return { kind: 'absent' };

  return { kind: 'found', identifier, line };
}
