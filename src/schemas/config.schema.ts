import os from 'node:os';
import path from 'node:path';
import { z, ZodError } from 'zod';

/**
 * Semantic-version field an update may not exceed. The index of each field
 * is the length of the release prefix kept when computing the ceiling.
 */
export const TargetField = z.enum(['major', 'minor', 'patch']);

export type TargetField = z.infer<typeof TargetField>;

export const TARGET_FIELD_INDEX: Record<TargetField, number> = {
  major: 0,
  minor: 1,
  patch: 2,
};

export const DEFAULT_REGISTRY_INDEX = 'https://pypi.io/pypi';
export const DEFAULT_PROJECT_BASE_URL = 'https://pypi.org/project';
export const INVENTORY_FILE_NAME = 'drv_names.txt';

/**
 * Worker count used when none is configured: one per core plus a few for
 * tasks waiting on the network, capped at 32.
 */
export function defaultConcurrency(): number {
  return Math.min(32, os.availableParallelism() + 4);
}

export const UpdaterConfig = z.object({
  /** Base URL of the JSON API, queried as `{registryIndex}/{name}/json` */
  registryIndex: z.string().url().default(DEFAULT_REGISTRY_INDEX),
  /** Base URL of the human-readable project page */
  projectBaseUrl: z.string().url().default(DEFAULT_PROJECT_BASE_URL),
  target: TargetField.default('major'),
  allowPrereleases: z.boolean().default(false),
  /** File looked up when a package path is a directory */
  declarationFileName: z.string().min(1).default('default.nix'),
  declarationExtension: z.string().min(1).default('.nix'),
  /** Inventory lines containing any of these are never matched */
  excludedInventoryMarkers: z.array(z.string().min(1)).default(['python2']),
  inventoryPath: z.string().min(1),
  /** Passed to `nix-env -f`; empty means the default channel */
  nixpkgs: z.string().default(''),
  generateInventory: z.boolean().default(true),
  concurrency: z.number().int().positive().default(defaultConcurrency),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export type UpdaterConfig = z.infer<typeof UpdaterConfig>;

export type UpdaterConfigInput = Omit<z.input<typeof UpdaterConfig>, 'inventoryPath'> & {
  inventoryPath?: string;
};

export type ConfigResult =
  | { success: true; config: UpdaterConfig }
  | { success: false; error: string; issues?: unknown };

/**
 * Directory used for the inventory when no path is given.
 */
export function resolveCacheHome(env: NodeJS.ProcessEnv): string {
  return env['XDG_CACHE_HOME'] || env['HOME'] || '.';
}

/**
 * Build the run configuration from user-supplied values and the environment.
 */
export function parseConfig(
  input: UpdaterConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult {
  try {
    const config = UpdaterConfig.parse({
      ...input,
      inventoryPath: input.inventoryPath ?? path.join(resolveCacheHome(env), INVENTORY_FILE_NAME),
    });
    return { success: true, config };
  } catch (err) {
    if (err instanceof ZodError) {
      return {
        success: false,
        error: `Invalid configuration: ${err.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join(', ')}`,
        issues: err.errors,
      };
    }
    return { success: false, error: `Invalid configuration: ${String(err)}` };
  }
}
