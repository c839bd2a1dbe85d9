/**
 * Command Line
 *
 * Turns argv into an explicit configuration. Parsing never touches the
 * file system or the terminal; the entry point injects the random and
 * clock sources.
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { CodetypeError } from "./errors";
import { DEFAULT_MAX_LINES } from "./excerpt/types";
import type { RunResult } from "./runner/types";
import { normalizeExtension } from "./selector/walk";
import { DEFAULT_SESSION_CONFIG } from "./session/types";
import { DEFAULT_THEME, formatPercent, resolveTheme } from "./ui";
import type { Theme } from "./ui";

export interface AppConfig {
  /** Root directory to sample from */
  dir: string;
  /** Extension filter, normalized (no leading dot, lower case) */
  extension?: string;
  /** Explicit file; skips the directory walk */
  file?: string;
  maxLines: number;
  theme: Theme;
  timeLimitMs: number;
  tabWidth: number;
  autoIndent: boolean;
  hidden: boolean;
  debug: boolean;
  debugFile?: string;
  debugFileOnly: boolean;
  random: () => number;
  now: () => number;
}

export type CliCommand =
  | { kind: "run"; config: AppConfig }
  | { kind: "help" }
  | { kind: "version" };

export interface CliSources {
  random: () => number;
  now: () => number;
}

const DEFAULT_TIME_SECONDS = DEFAULT_SESSION_CONFIG.timeLimitMs / 1000;

export const HELP_TEXT = `
codetype - typing practice on real source code

Usage: codetype [options]

Options:
  -d, --dir <dir>          Directory to pick a file from (default: .)
  -e, --extension <ext>    Only pick files with this extension
  -f, --file <file>        Type this file instead of a random one
  --line <n>               Lines in the excerpt (default: ${DEFAULT_MAX_LINES})
  -t, --theme <name>       Color theme: dark or light (default: ${DEFAULT_THEME})
  --time <seconds>         Time limit, also offered beside 15/30/60/120 (default: ${DEFAULT_TIME_SECONDS})
  --tab-width <n>          Spaces per tab (default: ${DEFAULT_SESSION_CONFIG.tabWidth})
  --no-indent              Do not fill leading indentation automatically
  --hidden                 Include hidden files and directories
  --debug                  Write debug output to stderr
  --debug-file <path>      Write debug output to file
  --debug-file-only        Only write to file, not stderr (use with --debug-file)
  -h, --help               Show this help message
  -V, --version            Show the version

Keys:
  esc                      Finish the round early
  ctrl+c                   Finish the round, or quit from the result screen
  r / n / q                Restart / new file / quit on the result screen
  ←/→                      Time limit of the next round, on the result screen

Examples:
  codetype                             # Random file under the current directory
  codetype -d ~/src/project -e rs      # Random .rs file from a project
  codetype -f src/main.ts --line 10    # First ten lines of one file
  codetype --time 60 -t light
`;

/**
 * Parse a positive whole number given to `option`.
 * @throws CodetypeError InvalidArgument
 */
export function parsePositiveInt(option: string, value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;

  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new CodetypeError("InvalidArgument", `${option} must be a positive integer (got "${value}")`);
  }
  return parsed;
}

function parseOptions(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        dir: { type: "string", short: "d", default: "." },
        extension: { type: "string", short: "e" },
        file: { type: "string", short: "f" },
        line: { type: "string", default: String(DEFAULT_MAX_LINES) },
        theme: { type: "string", short: "t", default: DEFAULT_THEME },
        time: { type: "string", default: String(DEFAULT_TIME_SECONDS) },
        "tab-width": { type: "string", default: String(DEFAULT_SESSION_CONFIG.tabWidth) },
        "no-indent": { type: "boolean", default: false },
        hidden: { type: "boolean", default: false },
        debug: { type: "boolean", default: false },
        "debug-file": { type: "string" },
        "debug-file-only": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "V", default: false },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CodetypeError("InvalidArgument", message, { cause: error });
  }
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @throws CodetypeError InvalidArgument for unknown options, positionals or bad values
 */
export function parseCliArgs(
  argv: readonly string[],
  sources: CliSources = { random: Math.random, now: Date.now }
): CliCommand {
  const { values } = parseOptions(argv);

  if (values.help ?? false) return { kind: "help" };
  if (values.version ?? false) return { kind: "version" };

  let extension: string | undefined;
  if (values.extension !== undefined) {
    extension = normalizeExtension(values.extension);
    if (extension === "") {
      throw new CodetypeError("InvalidArgument", `--extension must name an extension (got "${values.extension}")`);
    }
  }

  return {
    kind: "run",
    config: {
      dir: values.dir ?? ".",
      extension,
      file: values.file,
      maxLines: parsePositiveInt("--line", values.line ?? String(DEFAULT_MAX_LINES)),
      theme: resolveTheme(values.theme ?? DEFAULT_THEME),
      timeLimitMs: parsePositiveInt("--time", values.time ?? String(DEFAULT_TIME_SECONDS)) * 1000,
      tabWidth: parsePositiveInt("--tab-width", values["tab-width"] ?? String(DEFAULT_SESSION_CONFIG.tabWidth)),
      autoIndent: !(values["no-indent"] ?? false),
      hidden: values.hidden ?? false,
      debug: values.debug ?? false,
      debugFile: values["debug-file"],
      debugFileOnly: values["debug-file-only"] ?? false,
      random: sources.random,
      now: sources.now,
    },
  };
}

/** Version from package.json */
export function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

/**
 * One-line summary printed after the terminal is restored.
 * Null when no round finished.
 */
export function formatSummary(result: RunResult): string | null {
  const { score } = result;
  if (!score) return null;

  const rounds = result.rounds === 1 ? "1 round" : `${result.rounds} rounds`;
  return (
    `${Math.round(score.wpm)} wpm, ${formatPercent(score.accuracy)} accuracy ` +
    `(${score.reason}) on ${result.filePath}, ${rounds}`
  );
}
