import { z } from 'zod';

/**
 * One reportable update: the inventory identifier of the package, the version
 * declared in its expression, the newer release, and its project page.
 */
export const ResolvedUpdate = z.object({
  identifier: z.string().min(1),
  pname: z.string().min(1),
  oldVersion: z.string().min(1),
  newVersion: z.string().min(1),
  projectUrl: z.string().url(),
});

export type ResolvedUpdate = z.infer<typeof ResolvedUpdate>;

export const BatchSummary = z.object({
  /** Package paths given to the run */
  total: z.number().int().nonnegative(),
  /** Packages whose check completed (already current or updated) */
  checked: z.number().int().nonnegative(),
  updated: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export type BatchSummary = z.infer<typeof BatchSummary>;

export const UpdateReport = z.array(ResolvedUpdate);

export type UpdateReport = z.infer<typeof UpdateReport>;
