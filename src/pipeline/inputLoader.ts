import { readFile, stat } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { InputError, isNotFoundError, stringifyError } from "../common/errors.js";
import type { PriceRow, PriceSeries } from "../types.js";

export const CLOSE_COLUMN = "close";

const recordsSchema = z.array(z.array(z.string()));
const NUMERIC_CELL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export async function loadPriceSeries(path: string): Promise<PriceSeries> {
  const raw = await readInputFile(path);
  return parsePriceTable(raw);
}

export function parsePriceTable(raw: string): PriceSeries {
  const records = parseRecords(raw);
  const [header = [], ...body] = records;
  if (body.length === 0) {
    throw new InputError("empty", "Input file is empty");
  }

  const closeIndex = header.indexOf(CLOSE_COLUMN);
  if (closeIndex < 0) {
    throw new InputError(
      "missing_column",
      `Input missing required column '${CLOSE_COLUMN}'; columns present: [${header.join(", ")}]`,
    );
  }

  const rows = body.map((record, index): PriceRow => {
    // Only data cells are trimmed; headers must match exactly.
    const cells = record.map((value) => value.trim());
    const cell = cells[closeIndex];
    const close = Number(cell);
    if (!NUMERIC_CELL.test(cell) || !Number.isFinite(close)) {
      throw new InputError(
        "parse_failure",
        `Input parse failure: data row ${index + 1} has non-numeric ${CLOSE_COLUMN} value "${cell}"`,
      );
    }
    const fields: Record<string, string> = {};
    header.forEach((column, columnIndex) => {
      if (!Object.hasOwn(fields, column)) {
        fields[column] = cells[columnIndex];
      }
    });
    return { close, fields };
  });

  return { columns: header, rows };
}

function parseRecords(raw: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(raw, { bom: true, skip_empty_lines: true });
  } catch (error) {
    throw new InputError("parse_failure", `Input parse failure: ${stringifyError(error)}`);
  }
  const records = recordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new InputError("parse_failure", "Input parse failure: unexpected record shape");
  }
  return records.data;
}

async function readInputFile(path: string): Promise<string> {
  let isFile = false;
  try {
    isFile = (await stat(path)).isFile();
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
  }
  if (!isFile) {
    throw new InputError("not_found", `Input file not found: ${path}`);
  }
  return readFile(path, "utf8");
}
