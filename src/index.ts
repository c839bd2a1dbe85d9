#!/usr/bin/env tsx
/**
 * codetype - CLI Entry Point
 *
 * Picks a file, cuts an excerpt from it and hands the terminal to the
 * session runner. Setup errors end the program before the terminal is
 * touched.
 */

import { formatSummary, HELP_TEXT, parseCliArgs, readVersion } from "./cli";
import type { AppConfig } from "./cli";
import { CodetypeError, exitCodeFor, isCodetypeError } from "./errors";
import { readExcerpt } from "./excerpt";
import type { Excerpt } from "./excerpt";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { SessionRunner } from "./runner";
import { selectFile } from "./selector";

// Set once the arguments are known; decides whether fatal errors show a stack
let debugMode = false;

async function loadExcerpt(config: AppConfig, logger: Logger): Promise<Excerpt> {
  const file = await selectFile({
    dir: config.dir,
    file: config.file,
    extension: config.extension,
    hidden: config.hidden,
    random: config.random,
    logger,
  });
  const excerpt = await readExcerpt(file, config.maxLines);
  logger.debug("Excerpt ready", {
    file: excerpt.path,
    lines: excerpt.lineCount,
    totalLines: excerpt.totalLines,
    truncated: excerpt.truncated,
  });
  return excerpt;
}

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return 0;
  }
  if (command.kind === "version") {
    console.log(readVersion());
    return 0;
  }

  const { config } = command;
  debugMode = config.debug;

  const logger = createLogger({
    debug: config.debug,
    debugFile: config.debugFile,
    debugFileOnly: config.debugFileOnly,
    now: config.now,
  });

  logger.debug("=== codetype debug mode enabled ===");
  logger.debug("Config", {
    dir: config.dir,
    file: config.file,
    extension: config.extension,
    maxLines: config.maxLines,
    theme: config.theme.name,
    timeLimitMs: config.timeLimitMs,
    tabWidth: config.tabWidth,
    autoIndent: config.autoIndent,
    hidden: config.hidden,
  });

  const excerpt = await loadExcerpt(config, logger);

  if (!process.stdin.isTTY) {
    throw new CodetypeError("NotReadable", "stdin is not a terminal; run codetype interactively");
  }

  const runner = new SessionRunner({
    input: process.stdin,
    output: process.stdout,
    theme: config.theme,
    excerpt,
    nextExcerpt: () => loadExcerpt(config, logger),
    session: {
      timeLimitMs: config.timeLimitMs,
      tabWidth: config.tabWidth,
      autoIndent: config.autoIndent,
      now: config.now,
    },
    logger,
  });

  // Graceful shutdown: the runner restores the terminal before run() settles
  const shutdown = (signal: NodeJS.Signals) => runner.stop(`Received ${signal}`);
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    const result = await runner.run();
    logger.debug("Session ended", { rounds: result.rounds, reason: result.score?.reason ?? null });

    const summary = formatSummary(result);
    if (summary) console.log(summary);
    return 0;
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
}

// Run
main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (isCodetypeError(error)) {
      console.error(`codetype: ${error.message}`);
    } else {
      console.error("codetype: fatal error:", debugMode ? error : String(error));
    }
    process.exit(exitCodeFor(error));
  }
);
