/**
 * nixpkgs-pypi-updates — find newer PyPI releases for Python packages
 * declared in nixpkgs expressions.
 *
 * This is the orchestrator that wires the full run:
 * inventory → registry client → per-package checks (concurrent) → report
 *
 * The report lists one `<identifier> <old> <new> <url>` line per package with
 * a genuine update, in input order. Everything else is diagnostic output on
 * the logger.
 */

import { InventoryFailedError, toError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';
import type { UpdaterConfig } from './schemas/config.schema.js';
import type { ResolvedUpdate } from './schemas/output.schema.js';
import { createPypiClient, type RegistryClient } from './updater/registry-client.js';
import {
  collectUpdates,
  processBatch,
  type BatchResult,
} from './updater/update-orchestrator.js';
import {
  generateInventoryFile,
  loadInventory,
  type CommandRunner,
} from './inventory/inventory-generator.js';
import type { Inventory } from './inventory/inventory-lookup.js';
import { formatReportLine, serializeReport } from './utils/serializer.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '1.0.0';

export const RUN_BANNER_START = '########## BEGINNING OF NIXPKGS_PYPI_UPDATES ##########';
export const RUN_BANNER_END = '########## END OF NIXPKGS_PYPI_UPDATES ##########';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type ReportFormat = 'lines' | 'json';

export interface RunOptions {
  /** Absolute package paths (directories or `.nix` files) */
  packages: string[];
  config: UpdaterConfig;
  logger: Logger;
  /** Receives report text; one call per line, or one call for a JSON report */
  writeReport: (text: string) => void;
  format?: ReportFormat;
  /** Injected registry client; by default a PyPI client is created and closed */
  registry?: RegistryClient;
  /** Injected runner for `nix-env`; tests never spawn processes */
  commandRunner?: CommandRunner;
}

export type RunResult =
  | { success: true; batch: BatchResult; updates: ResolvedUpdate[] }
  | { success: false; error: string };

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export type { UpdaterConfig, UpdaterConfigInput, TargetField } from './schemas/config.schema.js';
export type { ResolvedUpdate, BatchSummary } from './schemas/output.schema.js';
export type { RegistryClient } from './updater/registry-client.js';
export type { VersionValue } from './updater/version.js';
export type { Inventory, IdentifierLookup } from './inventory/inventory-lookup.js';
export type { PackageOutcome, BatchResult, UpdateContext } from './updater/update-orchestrator.js';
export type { Logger } from './utils/logger.js';
export { parseConfig } from './schemas/config.schema.js';
export { createPypiClient } from './updater/registry-client.js';
export { parseVersion, tryParseVersion, compareVersions, versionComponent } from './updater/version.js';
export { resolveLatestVersion, computeCeiling } from './updater/version-resolver.js';
export { extractUnique, scanAttribute } from './analyzer/attribute-extractor.js';
export { createInventory, resolveIdentifier } from './inventory/inventory-lookup.js';
export { processPackage, processBatch } from './updater/update-orchestrator.js';
export { createLogger } from './utils/logger.js';
export * from './utils/errors.js';

// ---------------------------------------------------------------------------
// runUpdateCheck — main orchestrator
// ---------------------------------------------------------------------------

/**
 * Run the full update check.
 *
 * Pipeline steps:
 * 1. Generate the inventory (unless reusing an existing file) and load it
 * 2. Check every package concurrently
 * 3. Write the report in input order
 * 4. Log the batch summary
 *
 * Individual package failures are logged and counted; only batch-level
 * problems (inventory unavailable) make the run unsuccessful.
 */
export async function runUpdateCheck(options: RunOptions): Promise<RunResult> {
  const { config, logger, packages } = options;

  logger.info(RUN_BANNER_START);

  // -------------------------------------------------------------------------
  // Step 1: Inventory
  // -------------------------------------------------------------------------
  let inventory: Inventory;
  try {
    if (config.generateInventory) {
      await generateInventoryFile(
        { nixpkgs: config.nixpkgs, inventoryPath: config.inventoryPath },
        logger,
        options.commandRunner,
      );
    }
    inventory = await loadInventory(config.inventoryPath, config.excludedInventoryMarkers);
  } catch (err) {
    if (err instanceof InventoryFailedError) {
      logger.error(err.message);
      return { success: false, error: err.message };
    }
    throw err;
  }

  // -------------------------------------------------------------------------
  // Step 2: Check packages
  // -------------------------------------------------------------------------
  const registry =
    options.registry ??
    createPypiClient({ indexUrl: config.registryIndex, timeoutMs: config.requestTimeoutMs });

  logger.info(`Updating ${packages.length} packages...`);
  let batch: BatchResult;
  try {
    batch = await processBatch(packages, { config, registry, inventory, logger });
  } finally {
    if (!options.registry) {
      await registry.close().catch((err: unknown) => {
        logger.debug('Closing registry connections failed', toError(err));
      });
    }
  }
  logger.info('Finished updating packages.');

  // -------------------------------------------------------------------------
  // Step 3: Report
  // -------------------------------------------------------------------------
  const updates = collectUpdates(batch.outcomes);
  if (options.format === 'json') {
    options.writeReport(serializeReport(updates));
  } else {
    for (const update of updates) {
      options.writeReport(formatReportLine(update));
    }
  }

  // -------------------------------------------------------------------------
  // Step 4: Summary
  // -------------------------------------------------------------------------
  const { summary } = batch;
  logger.info(
    `Checked ${summary.checked} of ${summary.total} packages, ${summary.updated} updated` +
      ` (${summary.skipped} skipped, ${summary.failed} failed)`,
  );
  logger.info(RUN_BANNER_END);

  return { success: true, batch, updates };
}
