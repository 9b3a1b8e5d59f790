import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Logger } from "../src/logger.js";
import type { TextSink } from "../src/types.js";

const FIXED_TS = "2024-01-02T03:04:05.000Z";

function captureSink(): { sink: TextSink; text: () => string } {
  const chunks: string[] = [];
  return {
    sink: { write: (chunk: string) => chunks.push(chunk) },
    text: () => chunks.join(""),
  };
}

test("Logger appends formatted lines to file and console", async () => {
  const dir = await mkdtemp(join(tmpdir(), "signal-job-logger-"));
  try {
    const filePath = join(dir, "logs", "run.log");
    const consoleSink = captureSink();
    const logger = new Logger({
      filePath,
      console: consoleSink.sink,
      clock: () => new Date(FIXED_TS),
    });

    logger.info("job started");
    logger.warn("slow disk");
    logger.error("input missing");

    const expected =
      `[${FIXED_TS}] [INFO] job started\n` +
      `[${FIXED_TS}] [WARN] slow disk\n` +
      `[${FIXED_TS}] [ERROR] input missing\n`;
    assert.equal(await readFile(filePath, "utf8"), expected);
    assert.equal(consoleSink.text(), expected);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("Logger keeps appending to an existing log file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "signal-job-logger-append-"));
  try {
    const filePath = join(dir, "run.log");
    const clock = () => new Date(FIXED_TS);
    new Logger({ filePath, clock }).info("first run");
    new Logger({ filePath, clock }).info("second run");

    assert.equal(
      await readFile(filePath, "utf8"),
      `[${FIXED_TS}] [INFO] first run\n[${FIXED_TS}] [INFO] second run\n`,
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("Logger drops debug lines unless enabled", () => {
  const quiet = captureSink();
  new Logger({ console: quiet.sink, clock: () => new Date(FIXED_TS) }).debug("hidden");
  assert.equal(quiet.text(), "");

  const verbose = captureSink();
  new Logger({
    debugEnabled: true,
    console: verbose.sink,
    clock: () => new Date(FIXED_TS),
  }).debug("shown");
  assert.equal(verbose.text(), `[${FIXED_TS}] [DEBUG] shown\n`);
});

test("Logger reports a failing log file once and keeps writing to the console", async () => {
  const dir = await mkdtemp(join(tmpdir(), "signal-job-logger-broken-"));
  try {
    const consoleSink = captureSink();
    // A directory cannot be appended to.
    const logger = new Logger({
      filePath: dir,
      console: consoleSink.sink,
      clock: () => new Date(FIXED_TS),
    });

    logger.info("first");
    logger.info("second");

    const lines = consoleSink.text().trimEnd().split("\n");
    assert.equal(lines.length, 3);
    assert.ok(lines[0].startsWith(`[${FIXED_TS}] [WARN] Log file write failed (${dir}): `));
    assert.equal(lines[1], `[${FIXED_TS}] [INFO] first`);
    assert.equal(lines[2], `[${FIXED_TS}] [INFO] second`);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
