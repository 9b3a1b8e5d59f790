import test from "node:test";
import assert from "node:assert/strict";
import { UsageError } from "../src/common/errors.js";
import { USAGE, buildJobArgs } from "../src/config.js";

const FULL = [
  "--input",
  "data.csv",
  "--config",
  "config.yaml",
  "--output",
  "out/metrics.json",
  "--log-file",
  "out/run.log",
];

test("buildJobArgs reads the four required paths", () => {
  assert.deepEqual(buildJobArgs(FULL), {
    inputPath: "data.csv",
    configPath: "config.yaml",
    outputPath: "out/metrics.json",
    logFilePath: "out/run.log",
    debug: false,
  });
});

test("buildJobArgs accepts flags in any order plus --debug", () => {
  const args = buildJobArgs([
    "--debug",
    "--log-file",
    "run.log",
    "--output",
    "metrics.json",
    "--config",
    "config.yaml",
    "--input",
    "data.csv",
  ]);
  assert.equal(args.debug, true);
  assert.equal(args.inputPath, "data.csv");
  assert.equal(args.logFilePath, "run.log");
});

test("buildJobArgs reports every missing argument at once", () => {
  assert.throws(
    () => buildJobArgs(["--input", "data.csv", "--output", "metrics.json"]),
    (error: unknown) => {
      assert.ok(error instanceof UsageError);
      assert.equal(error.message, "--config is required; --log-file is required");
      assert.equal(error.usage, USAGE);
      return true;
    },
  );
});

test("buildJobArgs rejects a flag given without a value", () => {
  assert.throws(
    () => buildJobArgs(["--input", ...FULL.slice(2)]),
    (error: unknown) => {
      assert.ok(error instanceof UsageError);
      assert.equal(error.message, "--input needs a value");
      return true;
    },
  );
});
