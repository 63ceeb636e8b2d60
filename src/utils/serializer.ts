import { UpdateReport, type ResolvedUpdate } from '../schemas/output.schema.js';

/**
 * Format one update as a report line:
 * `<identifier> <oldVersion> <newVersion> <projectUrl>`.
 */
export function formatReportLine(update: ResolvedUpdate): string {
  return `${update.identifier} ${update.oldVersion} ${update.newVersion} ${update.projectUrl}`;
}

/**
 * Serialize the updates as a JSON array, preserving their order.
 */
export function serializeReport(updates: ResolvedUpdate[]): string {
  return JSON.stringify(updates, null, 2);
}

/**
 * Parse a JSON report back into validated updates.
 * Throws a ZodError if the JSON does not conform to the report schema.
 */
export function deserializeReport(json: string): UpdateReport {
  const parsed: unknown = JSON.parse(json);
  return UpdateReport.parse(parsed);
}
