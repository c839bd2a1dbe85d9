/**
 * File Selector
 *
 * Produces exactly one file to type: the explicit file when one is given,
 * otherwise a uniform random pick among the candidates of the directory walk.
 */

import fsp from "node:fs/promises";
import { constants } from "node:fs";
import { CodetypeError, fromFsError } from "../errors";
import { silentLogger } from "../logger";
import type { SelectorOptions } from "./types";
import { listFiles, normalizeExtension } from "./walk";

/**
 * Pick one item using `random` (a source in [0, 1)).
 * Returns undefined for an empty list.
 */
export function pickRandom<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.max(0, Math.floor(random() * items.length)));
  return items[index];
}

async function checkExplicitFile(file: string): Promise<string> {
  try {
    const stat = await fsp.stat(file);
    if (!stat.isFile()) {
      throw new CodetypeError("NotReadable", `${file}: not a regular file`, { path: file });
    }
    await fsp.access(file, constants.R_OK);
  } catch (error) {
    if (error instanceof CodetypeError) throw error;
    throw fromFsError(error, file, "open file");
  }
  return file;
}

/**
 * Select the file to type.
 *
 * @throws CodetypeError NoMatchingFiles, PathNotFound or NotReadable
 */
export async function selectFile(options: SelectorOptions): Promise<string> {
  const logger = options.logger ?? silentLogger;

  if (options.file !== undefined) {
    logger.debug("Using explicit file", { file: options.file });
    return checkExplicitFile(options.file);
  }

  const candidates = await listFiles(options.dir, options);
  const picked = pickRandom(candidates, options.random);

  if (picked === undefined) {
    const filter = options.extension ? ` with extension .${normalizeExtension(options.extension)}` : "";
    throw new CodetypeError("NoMatchingFiles", `no files${filter} found in ${options.dir}`, {
      path: options.dir,
    });
  }

  logger.debug("Picked file", { file: picked, candidates: candidates.length });
  return picked;
}
