import { readFile, stat } from "node:fs/promises";
import { parseDocument } from "yaml";
import { z } from "zod";
import { ConfigError, isNotFoundError } from "../common/errors.js";
import { sortedDifference } from "../common/math.js";
import type { JsonValue, RunConfig } from "../types.js";

export const REQUIRED_CONFIG_FIELDS = ["seed", "window", "version"] as const;

const SEED_MESSAGE = "seed must be an integer";
const WINDOW_MESSAGE = "window must be a positive integer";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

// YAML integers arrive as bigint (intAsBigInt), floats as number, so the
// bigint check is what separates `7` from `7.0` and `"7"`.
const fieldSchema = z.object({
  seed: z
    .bigint({ invalid_type_error: SEED_MESSAGE })
    .refine((value) => value >= MIN_SAFE && value <= MAX_SAFE, SEED_MESSAGE)
    .transform(Number)
    .optional(),
  window: z
    .bigint({ invalid_type_error: WINDOW_MESSAGE })
    .refine((value) => value >= 1n && value <= MAX_SAFE, WINDOW_MESSAGE)
    .transform(Number)
    .optional(),
});

export async function loadRunConfig(path: string): Promise<RunConfig> {
  const raw = await readConfigFile(path);
  const mapping = parseConfigMapping(raw);
  return validateConfigMapping(mapping);
}

/**
 * Validates an already-parsed mapping. Missing fields and type problems are
 * collected together and reported in one error.
 */
export function validateConfigMapping(mapping: Record<string, unknown>): RunConfig {
  const missing = sortedDifference(REQUIRED_CONFIG_FIELDS, Object.keys(mapping));
  const hasVersion = Object.prototype.hasOwnProperty.call(mapping, "version");
  const version = hasVersion ? toJsonValue(mapping.version) : undefined;

  const problems: string[] = [];
  if (missing.length > 0) {
    problems.push(`missing required fields: [${missing.join(", ")}]`);
  }
  const fields = fieldSchema.safeParse({ seed: mapping.seed, window: mapping.window });
  if (!fields.success) {
    problems.push(...fields.error.issues.map((issue) => issue.message));
  }

  if (fields.success && missing.length === 0) {
    const { seed, window } = fields.data;
    if (seed !== undefined && window !== undefined && version !== undefined) {
      return Object.freeze({ seed, window, version });
    }
  }

  // The configured version is only trusted once every required field is present.
  if (missing.length > 0) {
    throw new ConfigError("missing_fields", `Invalid config: ${problems.join("; ")}`, {
      missingFields: missing,
    });
  }
  throw new ConfigError("invalid_fields", `Invalid config: ${problems.join("; ")}`, {
    knownVersion: version,
  });
}

export function parseConfigMapping(raw: string): Record<string, unknown> {
  const doc = parseDocument(raw, { intAsBigInt: true, prettyErrors: false });
  if (doc.errors.length > 0) {
    throw new ConfigError("parse_failure", `Config parse failure: ${doc.errors[0].message}`);
  }

  const value: unknown = doc.toJS();
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    const kind = Array.isArray(value) ? "sequence" : typeof value;
    throw new ConfigError(
      "parse_failure",
      `Config parse failure: expected a key-value mapping, got ${kind}`,
    );
  }
  return value;
}

async function readConfigFile(path: string): Promise<string> {
  let isFile = false;
  try {
    isFile = (await stat(path)).isFile();
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
  }
  if (!isFile) {
    throw new ConfigError("not_found", `Config file not found: ${path}`);
  }
  return readFile(path, "utf8");
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
  }
  if (typeof value === "number") {
    // JSON has no NaN or Infinity.
    return Number.isFinite(value) ? value : String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonValue(item);
    }
    return out;
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
