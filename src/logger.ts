import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { stringifyError } from "./common/errors.js";
import type { TextSink } from "./types.js";

type Level = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  debugEnabled?: boolean;
  /** Log file appended one line at a time. */
  filePath?: string;
  console?: TextSink;
  clock?: () => Date;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly filePath?: string;
  private readonly console?: TextSink;
  private readonly clock: () => Date;
  private fileWriteFailed = false;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
    this.filePath = options.filePath;
    this.console = options.console;
    this.clock = options.clock ?? (() => new Date());
    if (this.filePath) {
      mkdirSync(dirname(this.filePath), { recursive: true });
    }
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = this.clock().toISOString();
    // Unified, grep-friendly log format.
    const line = `[${ts}] [${level.toUpperCase()}] ${message}\n`;
    if (this.filePath) {
      try {
        appendFileSync(this.filePath, line, "utf8");
      } catch (error) {
        this.reportFileFailure(ts, this.filePath, error);
      }
    }
    this.console?.write(line);
  }

  // Reported once per logger; the console keeps receiving every line.
  private reportFileFailure(ts: string, filePath: string, error: unknown): void {
    if (this.fileWriteFailed) {
      return;
    }
    this.fileWriteFailed = true;
    const sink = this.console ?? process.stderr;
    sink.write(`[${ts}] [WARN] Log file write failed (${filePath}): ${stringifyError(error)}\n`);
  }
}
