/**
 * Errors thrown while an engine is being set up. Findings about a
 * configuration are never thrown; they come back in a ValidationResult.
 */

export class EngineConfigError extends Error {
  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super(message);
    this.name = "EngineConfigError";
  }
}

export class UnsupportedFamilyError extends Error {
  constructor(tag: string, unitType: string) {
    super(`Unit "${unitType}" declares family '${tag}', which has no normalization strategy`);
    this.name = "UnsupportedFamilyError";
  }
}
