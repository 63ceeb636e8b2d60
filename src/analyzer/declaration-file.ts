/**
 * Declaration files — the Nix expressions that declare a Python package.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { TargetField } from '../schemas/config.schema.js';
import { parseVersion, type VersionValue } from '../updater/version.js';
import { extractUnique } from './attribute-extractor.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export interface PackageRecord {
  readonly path: string;
  readonly pname: string;
  readonly declaredVersion: VersionValue;
  readonly targetField: TargetField;
}

export type DeclarationLocation =
  | { kind: 'file'; path: string }
  | { kind: 'not-found'; path: string }
  | { kind: 'wrong-extension'; path: string };

// ---------------------------------------------------------------------------
// locateDeclarationFile
// ---------------------------------------------------------------------------

/**
 * Resolve a package path to the expression file to read. Directories resolve
 * to `fileName` inside them.
 */
export async function locateDeclarationFile(
  packagePath: string,
  options: { fileName: string; extension: string },
): Promise<DeclarationLocation> {
  let filePath = packagePath;
  if (await isDirectory(filePath)) {
    filePath = path.join(filePath, options.fileName);
  }

  if (!(await isFile(filePath))) return { kind: 'not-found', path: filePath };
  if (!filePath.endsWith(options.extension)) return { kind: 'wrong-extension', path: filePath };
  return { kind: 'file', path: filePath };
}

// ---------------------------------------------------------------------------
// readPackageRecord
// ---------------------------------------------------------------------------

/**
 * Build a PackageRecord from the expression text of `filePath`.
 *
 * @throws MissingAttributeError / AmbiguousAttributeError for `pname` or `version`
 * @throws InvalidVersionError when the declared version does not parse
 */
export function parsePackageRecord(
  filePath: string,
  text: string,
  targetField: TargetField,
): PackageRecord {
  const pname = extractUnique('pname', text);
  const version = extractUnique('version', text);
  return {
    path: filePath,
    pname,
    declaredVersion: parseVersion(version),
    targetField,
  };
}

export async function readPackageRecord(
  filePath: string,
  targetField: TargetField,
): Promise<PackageRecord> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parsePackageRecord(filePath, text, targetField);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}
