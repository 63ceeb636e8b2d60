/**
 * Command-line surface.
 *
 * `createProgram` only parses; the work happens in `runCli`, which takes its
 * streams and clients from `CliIo` so it can be driven from tests.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { runUpdateCheck, VERSION } from '../index.js';
import type { CommandRunner } from '../inventory/inventory-generator.js';
import { parseConfig, TargetField, type UpdaterConfigInput } from '../schemas/config.schema.js';
import type { RegistryClient } from '../updater/registry-client.js';
import { toError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { collectPackagePaths } from '../utils/package-list.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const CliOptions = z.object({
  target: TargetField,
  nixpkgs: z.string(),
  drvNamePath: z.string().optional(),
  registry: z.string().optional(),
  pre: z.boolean(),
  concurrency: z.number().int().positive().optional(),
  timeout: z.number().int().positive().optional(),
  generateInventory: z.boolean(),
  json: z.boolean(),
  verbose: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptions>;

export type CliAction = (packages: string[], options: CliOptions) => Promise<void>;

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// createProgram
// ---------------------------------------------------------------------------

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('nixpkgs-pypi-updates')
    .description(
      'List Python packages in nixpkgs that have a newer release on PyPI.\n' +
        'Package paths come from the arguments and/or standard input.',
    )
    .version(VERSION)
    .argument('[packages...]', 'package directories or .nix files')
    .addOption(
      new Option('--target <field>', 'highest version field an update may change')
        .choices(TargetField.options)
        .default('major'),
    )
    .option('--nixpkgs <path>', 'nixpkgs checkout used to build the inventory', '')
    .option('--drv-name-path <path>', 'where the inventory of derivation names is cached')
    .option('--registry <url>', 'base URL of the PyPI JSON API')
    .option('--pre', 'consider pre-releases', false)
    .option('--concurrency <n>', 'number of packages checked at once', parsePositiveInt)
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parsePositiveInt)
    .option('--no-generate-inventory', 'reuse the inventory file instead of running nix-env')
    .option('--json', 'print the report as a JSON array', false)
    .option('-v, --verbose', 'show debug output', false)
    .action(async (packages: string[], rawOptions: unknown) => {
      await action(packages, CliOptions.parse(rawOptions));
    });

  return program;
}

/**
 * Map command-line options onto configuration input.
 */
export function toConfigInput(options: CliOptions): UpdaterConfigInput {
  return {
    target: options.target,
    nixpkgs: options.nixpkgs,
    inventoryPath: options.drvNamePath,
    registryIndex: options.registry,
    allowPrereleases: options.pre,
    concurrency: options.concurrency,
    requestTimeoutMs: options.timeout,
    generateInventory: options.generateInventory,
  };
}

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

export interface CliIo {
  /** Standard input text, or null when stdin is a terminal */
  readStdin: () => Promise<string | null>;
  writeReport: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  logger?: Logger;
  registry?: RegistryClient;
  commandRunner?: CommandRunner;
}

/**
 * Execute a parsed command line and return the process exit code.
 *
 * Package failures do not affect the exit code; only usage, configuration
 * and inventory problems do.
 */
export async function runCli(
  packageArgs: string[],
  options: CliOptions,
  io: CliIo,
): Promise<number> {
  const logger = io.logger ?? createLogger({ verbose: options.verbose });

  const parsed = parseConfig(toConfigInput(options), io.env);
  if (!parsed.success) {
    logger.error(parsed.error);
    return 2;
  }

  const stdinText = await io.readStdin();
  if (stdinText !== null) logger.info('Reading package paths from stdin');

  let packages: string[];
  try {
    packages = collectPackagePaths(packageArgs, stdinText, io.cwd);
  } catch (err) {
    logger.error(toError(err).message);
    return 2;
  }

  const result = await runUpdateCheck({
    packages,
    config: parsed.config,
    logger,
    format: options.json ? 'json' : 'lines',
    writeReport: io.writeReport,
    registry: io.registry,
    commandRunner: io.commandRunner,
  });
  return result.success ? 0 : 1;
}
