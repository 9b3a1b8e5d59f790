import { JobError, stringifyError } from "../common/errors.js";
import type { ConfigLabel } from "../types.js";

export function describeFailure(error: unknown): string {
  if (error instanceof JobError) {
    return error.message;
  }
  return `Unexpected error: ${stringifyError(error)}`;
}

export function formatLabel(label: ConfigLabel): string {
  return typeof label === "string" ? label : JSON.stringify(label);
}

export function elapsedMs(startedMs: number, nowMs: number): number {
  return Math.max(0, Math.floor(nowMs - startedMs));
}
