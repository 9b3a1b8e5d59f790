#!/usr/bin/env node
import { UsageError, stringifyError } from "./common/errors.js";
import { buildJobArgs } from "./config.js";
import { runJob } from "./orchestrator.js";

async function main(): Promise<void> {
  const args = buildJobArgs(process.argv.slice(2));
  const outcome = await runJob(args);
  process.exitCode = outcome.exitCode;
}

main().catch((error) => {
  if (error instanceof UsageError) {
    process.stderr.write(`${error.message}\n${error.usage}\n`);
    process.exit(2);
  }
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
