/**
 * Debug Logger
 *
 * Timestamped debug lines, written to stderr and/or a debug file.
 * Console output can be suspended while the typing session owns the terminal.
 */

import { appendFileSync, writeFileSync } from "node:fs";

export interface LoggerOptions {
  /** Log anything at all */
  debug: boolean;
  /** Append lines to this file (truncated when the logger is created) */
  debugFile?: string;
  /** Only write to the debug file, never to stderr */
  debugFileOnly?: boolean;
  /** Sink for console output (default: process.stderr) */
  stream?: { write(chunk: string): unknown };
  /** Clock used for timestamps (default: Date.now) */
  now?: () => number;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  /** Stop writing to the console; the debug file keeps receiving lines */
  suspendConsole(): void;
  resumeConsole(): void;
}

export function formatLogLine(time: number, message: string, data?: unknown): string {
  const timestamp = new Date(time).toISOString().split("T")[1]?.slice(0, -1) ?? "";
  return data !== undefined
    ? `[codetype ${timestamp}] ${message} ${JSON.stringify(data)}`
    : `[codetype ${timestamp}] ${message}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? Date.now;
  let consoleSuspended = false;

  if (options.debug && options.debugFile) {
    writeFileSync(
      options.debugFile,
      `[codetype] Debug log started at ${new Date(now()).toISOString()}\n`
    );
  }

  return {
    debug(message, data) {
      if (!options.debug) return;

      const line = formatLogLine(now(), message, data);

      if (options.debugFile) {
        appendFileSync(options.debugFile, line + "\n");
      }

      if (!options.debugFileOnly && !consoleSuspended) {
        stream.write(line + "\n");
      }
    },
    suspendConsole() {
      consoleSuspended = true;
    },
    resumeConsole() {
      consoleSuspended = false;
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ debug: false });
