import { z } from 'zod';

/**
 * The part of the PyPI JSON API response the update check relies on:
 * `releases` maps every published version string to its release files.
 * Only the keys are used; other top-level fields pass through untouched.
 */
export const RegistryReleasesResponse = z
  .object({
    releases: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export type RegistryReleasesResponse = z.infer<typeof RegistryReleasesResponse>;
