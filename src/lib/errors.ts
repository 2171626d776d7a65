/**
 * Error taxonomy for the emission engine.
 * Every error is local to a single call; nothing here is retried.
 */

export class CarbonTrackerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Requested category/subcategory/activity has no entry in the factor table
 */
export class UnknownFactorError extends CarbonTrackerError {
  readonly keyPath: readonly string[];

  constructor(keyPath: readonly string[]) {
    super(`Unknown emission factor: ${keyPath.join('.')}`);
    this.keyPath = keyPath;
  }
}

/**
 * Structurally valid but semantically invalid input
 * (unsupported unit, zero passengers, non-positive lifetime)
 */
export class InvalidArgumentError extends CarbonTrackerError {}

/**
 * Place could not be resolved or the routing call failed
 */
export class DistanceLookupError extends CarbonTrackerError {}

export class InvalidFactorTableError extends CarbonTrackerError {}

export class ConfigurationError extends CarbonTrackerError {}
