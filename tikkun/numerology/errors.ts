/**
 * Error model for the numeric pipeline.
 * Input errors carry the offending detail so a caller can prompt for correction;
 * configuration errors signal a deployment defect and are never recovered from.
 */

export class InvalidValueError extends Error {
  constructor(public value: number) {
    super(`Cannot reduce ${value}: expected a positive integer`);
    this.name = "InvalidValueError";
  }
}

export class InvalidDateError extends Error {
  constructor(public input: string, public reason: string) {
    super(`Invalid birth date ${input}: ${reason}`);
    this.name = "InvalidDateError";
  }
}

export type EmptyNameScope = "name" | "vowels" | "consonants";

export class EmptyNameError extends Error {
  constructor(public input: string, public scope: EmptyNameScope = "name") {
    super(
      scope === "name"
        ? `Name "${input}" has no letters after normalization`
        : `Name "${input}" has no ${scope} after normalization`
    );
    this.name = "EmptyNameError";
  }
}

export class UnsupportedCharacterError extends Error {
  constructor(
    public input: string,
    public character: string,
    public position: number
  ) {
    super(
      `Unsupported character "${character}" at position ${position} in name "${input}"`
    );
    this.name = "UnsupportedCharacterError";
  }
}

export class KnowledgeBaseGapError extends Error {
  constructor(public dimension: string, public number: number) {
    super(`Knowledge base has no descriptor for ${dimension} ${number}`);
    this.name = "KnowledgeBaseGapError";
  }
}

export class ConfigurationError extends Error {
  constructor(public source: string, public detail: string) {
    super(`Invalid configuration in ${source}: ${detail}`);
    this.name = "ConfigurationError";
  }
}

/** Raised when a report is composed with a name flag the profile contradicts. */
export class ProfileMismatchError extends Error {
  constructor(public hasName: boolean, public carriesName: boolean) {
    super(
      `Report requested with hasName=${hasName} but the profile ${
        carriesName ? "carries" : "lacks"
      } name-derived numbers`
    );
    this.name = "ProfileMismatchError";
  }
}

export type InputError =
  | InvalidValueError
  | InvalidDateError
  | EmptyNameError
  | UnsupportedCharacterError;

export function isInputError(err: unknown): err is InputError {
  return (
    err instanceof InvalidValueError ||
    err instanceof InvalidDateError ||
    err instanceof EmptyNameError ||
    err instanceof UnsupportedCharacterError
  );
}
