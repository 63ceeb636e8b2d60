/**
 * Update orchestrator — checks one package end to end and fans the check out
 * over a batch of packages.
 *
 * Per package:
 * 1. Locate the declaration file (skip when absent or not a Nix file)
 * 2. Extract pname and version
 * 3. Fetch known versions from the registry
 * 4. Resolve the best version; the declared one being best is a no-op, an
 *    older one is a downgrade failure
 * 5. Map the package to its inventory identifier
 * 6. Emit the update
 *
 * Every failure is caught at the package boundary; one bad package never
 * stops the rest of the batch.
 */

import {
  locateDeclarationFile,
  readPackageRecord,
  type PackageRecord,
} from '../analyzer/declaration-file.js';
import { resolveIdentifier, type Inventory } from '../inventory/inventory-lookup.js';
import type { UpdaterConfig } from '../schemas/config.schema.js';
import type { BatchSummary, ResolvedUpdate } from '../schemas/output.schema.js';
import { DowngradeError, NoEligibleVersionError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { RegistryClient } from './registry-client.js';
import { compareVersions, type VersionValue } from './version.js';
import { resolveLatestVersion } from './version-resolver.js';
import { mapWithConcurrency } from './worker-pool.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type NoOpReason = 'up-to-date' | 'not-in-inventory';
export type SkipReason = 'not-found' | 'wrong-extension';

export type PackageOutcome =
  | { kind: 'noop'; path: string; pname: string; reason: NoOpReason }
  | { kind: 'updated'; path: string; update: ResolvedUpdate }
  | { kind: 'skipped'; path: string; reason: SkipReason }
  | { kind: 'failed'; path: string; error: Error };

export interface UpdateContext {
  config: UpdaterConfig;
  registry: RegistryClient;
  inventory: Inventory;
  logger: Logger;
}

export interface BatchResult {
  /** One outcome per input path, in input order */
  outcomes: PackageOutcome[];
  summary: BatchSummary;
}

// ---------------------------------------------------------------------------
// processPackage
// ---------------------------------------------------------------------------

/**
 * Check a single package path. Never rejects.
 */
export async function processPackage(
  packagePath: string,
  context: UpdateContext,
): Promise<PackageOutcome> {
  const { config, logger } = context;

  const location = await locateDeclarationFile(packagePath, {
    fileName: config.declarationFileName,
    extension: config.declarationExtension,
  });

  if (location.kind === 'not-found') {
    logger.info(`Path ${location.path}: does not exist.`);
    return { kind: 'skipped', path: location.path, reason: 'not-found' };
  }
  if (location.kind === 'wrong-extension') {
    logger.info(`Path ${location.path}: does not end with \`${config.declarationExtension}\`.`);
    return { kind: 'skipped', path: location.path, reason: 'wrong-extension' };
  }

  try {
    const record = await readPackageRecord(location.path, config.target);
    return await checkRecord(record, context);
  } catch (err) {
    const error = toError(err);
    logger.warn(`Path ${location.path}: ${error.message}`);
    return { kind: 'failed', path: location.path, error };
  }
}

async function checkRecord(record: PackageRecord, context: UpdateContext): Promise<PackageOutcome> {
  const { config, registry, inventory, logger } = context;
  const declared = record.declaredVersion;

  const known = await registry.fetchReleases(record.pname);

  let resolved: VersionValue;
  try {
    resolved = resolveLatestVersion(declared.raw, record.targetField, known, {
      allowPrereleases: config.allowPrereleases,
    });
  } catch (err) {
    if (err instanceof NoEligibleVersionError && err.currentIsLatest) {
      return upToDate(record, logger);
    }
    throw err;
  }

  if (compareVersions(resolved, declared) < 0) {
    throw new DowngradeError(record.pname, declared.raw, resolved.raw);
  }

  const lookup = resolveIdentifier(record.pname, declared.raw, inventory);
  if (lookup.kind === 'absent') {
    logger.info(`Path ${record.path}: no inventory entry for ${record.pname}-${declared.raw}.`);
    return { kind: 'noop', path: record.path, pname: record.pname, reason: 'not-in-inventory' };
  }

  const update: ResolvedUpdate = {
    identifier: lookup.identifier,
    pname: record.pname,
    oldVersion: declared.raw,
    newVersion: resolved.raw,
    projectUrl: projectUrl(config.projectBaseUrl, record.pname),
  };
  logger.debug(
    `Path ${record.path}: ${update.identifier} ${update.oldVersion} -> ${update.newVersion}`,
  );
  return { kind: 'updated', path: record.path, update };
}

function upToDate(record: PackageRecord, logger: Logger): PackageOutcome {
  logger.info(`Path ${record.path}: already at latest version for: ${record.pname}.`);
  return { kind: 'noop', path: record.path, pname: record.pname, reason: 'up-to-date' };
}

/**
 * Human-readable project page, e.g. "https://pypi.org/project/foo/".
 */
export function projectUrl(baseUrl: string, pname: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${pname}/`;
}

// ---------------------------------------------------------------------------
// processBatch
// ---------------------------------------------------------------------------

/**
 * Check every package path concurrently, bounded by `config.concurrency`.
 */
export async function processBatch(
  packagePaths: readonly string[],
  context: UpdateContext,
): Promise<BatchResult> {
  const outcomes = await mapWithConcurrency(
    packagePaths,
    context.config.concurrency,
    (packagePath) => processPackage(packagePath, context),
  );
  return { outcomes, summary: summarizeOutcomes(outcomes) };
}

export function summarizeOutcomes(outcomes: readonly PackageOutcome[]): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, checked: 0, updated: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'noop':
        summary.checked++;
        break;
      case 'updated':
        summary.checked++;
        summary.updated++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'failed':
        summary.failed++;
        break;
    }
  }
  return summary;
}

/**
 * Updates in input order.
 */
export function collectUpdates(outcomes: readonly PackageOutcome[]): ResolvedUpdate[] {
  const updates: ResolvedUpdate[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'updated') updates.push(outcome.update);
  }
  return updates;
}
