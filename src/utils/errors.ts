/**
 * Error taxonomy for the update check.
 *
 * Every failure a single package can produce is an `UpdateCheckError` with a
 * stable `code`, so the orchestrator can classify outcomes without matching
 * on messages.
 */

export enum UpdateErrorCode {
  MISSING_ATTRIBUTE = 'MISSING_ATTRIBUTE',
  AMBIGUOUS_ATTRIBUTE = 'AMBIGUOUS_ATTRIBUTE',
  INVALID_VERSION = 'INVALID_VERSION',
  FETCH_FAILED = 'FETCH_FAILED',
  NO_ELIGIBLE_VERSION = 'NO_ELIGIBLE_VERSION',
  DOWNGRADE = 'DOWNGRADE',
  INVENTORY_FAILED = 'INVENTORY_FAILED',
}

export class UpdateCheckError extends Error {
  readonly code: UpdateErrorCode;

  constructor(code: UpdateErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpdateCheckError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export class MissingAttributeError extends UpdateCheckError {
  readonly attribute: string;

  constructor(attribute: string) {
    super(UpdateErrorCode.MISSING_ATTRIBUTE, `no value found for ${attribute}`);
    this.name = 'MissingAttributeError';
    this.attribute = attribute;
  }
}

export class AmbiguousAttributeError extends UpdateCheckError {
  readonly attribute: string;
  readonly values: readonly string[];

  constructor(attribute: string, values: readonly string[]) {
    super(
      UpdateErrorCode.AMBIGUOUS_ATTRIBUTE,
      `found too many values for ${attribute} (${values.length})`,
    );
    this.name = 'AmbiguousAttributeError';
    this.attribute = attribute;
    this.values = values;
  }
}

export class InvalidVersionError extends UpdateCheckError {
  readonly raw: string;

  constructor(raw: string) {
    super(UpdateErrorCode.INVALID_VERSION, `invalid version: '${raw}'`);
    this.name = 'InvalidVersionError';
    this.raw = raw;
  }
}

export class FetchFailedError extends UpdateCheckError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, options?: { status?: number; reason?: string; cause?: unknown }) {
    const detail =
      options?.status !== undefined
        ? ` (HTTP ${options.status})`
        : options?.reason !== undefined
          ? ` (${options.reason})`
          : '';
    super(UpdateErrorCode.FETCH_FAILED, `request for ${url} failed${detail}`, {
      cause: options?.cause,
    });
    this.name = 'FetchFailedError';
    this.url = url;
    this.status = options?.status;
  }
}

export class NoEligibleVersionError extends UpdateCheckError {
  readonly currentVersion: string;
  readonly target: string;
  /** True when the best candidate is the current version itself */
  readonly currentIsLatest: boolean;

  constructor(currentVersion: string, target: string, options?: { currentIsLatest?: boolean }) {
    const currentIsLatest = options?.currentIsLatest ?? false;
    super(
      UpdateErrorCode.NO_ELIGIBLE_VERSION,
      currentIsLatest
        ? `${currentVersion} is the latest version within target '${target}'`
        : `no eligible version for ${currentVersion} within target '${target}'`,
    );
    this.name = 'NoEligibleVersionError';
    this.currentVersion = currentVersion;
    this.target = target;
    this.currentIsLatest = currentIsLatest;
  }
}

export class DowngradeError extends UpdateCheckError {
  readonly pname: string;
  readonly fromVersion: string;
  readonly toVersion: string;

  constructor(pname: string, fromVersion: string, toVersion: string) {
    super(
      UpdateErrorCode.DOWNGRADE,
      `downgrade for ${pname} (${fromVersion} -> ${toVersion})`,
    );
    this.name = 'DowngradeError';
    this.pname = pname;
    this.fromVersion = fromVersion;
    this.toVersion = toVersion;
  }
}

export class InventoryFailedError extends UpdateCheckError {
  readonly inventoryPath: string;

  constructor(inventoryPath: string, reason: string, cause?: unknown) {
    super(
      UpdateErrorCode.INVENTORY_FAILED,
      `inventory at ${inventoryPath} unavailable: ${reason}`,
      { cause },
    );
    this.name = 'InventoryFailedError';
    this.inventoryPath = inventoryPath;
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
