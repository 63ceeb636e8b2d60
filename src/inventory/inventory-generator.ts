/**
 * Inventory generation and loading.
 *
 * The inventory is produced by `nix-env -qa` against a nixpkgs checkout and
 * cached on disk so later runs can reuse it.
 */

import { execFile } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { InventoryFailedError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { createInventory, type Inventory } from './inventory-lookup.js';

const execFileAsync = promisify(execFile);

/**
 * Runs an external command and resolves with its stdout.
 * Injected so tests never spawn `nix-env`.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const execCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, {
    encoding: 'utf-8',
    maxBuffer: 256 * 1024 * 1024,
  });
  return stdout;
};

/**
 * Arguments for `nix-env` listing every available derivation name.
 */
export function inventoryCommandArgs(nixpkgs: string): string[] {
  return nixpkgs === '' ? ['-qa'] : ['-f', nixpkgs, '-qa'];
}

/**
 * Regenerate the inventory file at `inventoryPath`.
 */
export async function generateInventoryFile(
  options: { nixpkgs: string; inventoryPath: string },
  logger: Logger,
  run: CommandRunner = execCommand,
): Promise<void> {
  const args = inventoryCommandArgs(options.nixpkgs);
  logger.info(`Creating drv name file at ${options.inventoryPath}`);
  logger.info(`Executing: nix-env ${args.join(' ')}`);

  let listing: string;
  try {
    listing = await run('nix-env', args);
  } catch (err) {
    throw new InventoryFailedError(
      options.inventoryPath,
      `nix-env failed: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }

  try {
    await fs.mkdir(path.dirname(options.inventoryPath), { recursive: true });
    await fs.writeFile(options.inventoryPath, listing, 'utf-8');
  } catch (err) {
    throw new InventoryFailedError(options.inventoryPath, 'could not write file', err);
  }
}

/**
 * Read the inventory file into memory.
 */
export async function loadInventory(
  inventoryPath: string,
  excludedMarkers: readonly string[],
): Promise<Inventory> {
  let text: string;
  try {
    text = await fs.readFile(inventoryPath, 'utf-8');
  } catch (err) {
    throw new InventoryFailedError(inventoryPath, 'could not read file', err);
  }
  return createInventory(text, excludedMarkers);
}
