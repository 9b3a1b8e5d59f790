import type { ConfigLabel } from "../types.js";

export type JobStage = "config" | "input" | "engine";

export type ConfigErrorCode = "not_found" | "parse_failure" | "missing_fields" | "invalid_fields";
export type InputErrorCode = "not_found" | "parse_failure" | "empty" | "missing_column";
export type EngineErrorCode = "invalid_window" | "insufficient_history";

export abstract class JobError extends Error {
  abstract readonly stage: JobStage;
  abstract readonly code: string;
}

export interface ConfigErrorDetails {
  missingFields?: string[];
  knownVersion?: ConfigLabel;
}

export class ConfigError extends JobError {
  readonly stage = "config";
  readonly missingFields: string[];
  readonly knownVersion?: ConfigLabel;

  constructor(
    readonly code: ConfigErrorCode,
    message: string,
    details: ConfigErrorDetails = {},
  ) {
    super(message);
    this.name = "ConfigError";
    this.missingFields = details.missingFields ?? [];
    this.knownVersion = details.knownVersion;
  }
}

export class InputError extends JobError {
  readonly stage = "input";

  constructor(
    readonly code: InputErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "InputError";
  }
}

export class EngineError extends JobError {
  readonly stage = "engine";

  constructor(
    readonly code: EngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EngineError";
  }
}

export class UsageError extends Error {
  constructor(
    message: string,
    readonly usage: string,
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

export function isNotFoundError(value: unknown): boolean {
  return value instanceof Error && "code" in value && value.code === "ENOENT";
}
