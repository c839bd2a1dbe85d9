/**
 * Directory Walk
 *
 * Enumerates candidate files below a root directory. Each directory's
 * .gitignore and .ignore apply to the paths beneath it; deeper rules are
 * consulted after their ancestors' so a nested negation can re-include a path.
 */

import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import ignore, { type Ignore } from "ignore";
import { CodetypeError, fromFsError } from "../errors";
import { silentLogger } from "../logger";
import type { ListFilesOptions } from "./types";
import { IGNORE_FILES } from "./types";

interface IgnoreScope {
  /** Directory the rules were read from, relative to the root (posix, "" for the root) */
  base: string;
  matcher: Ignore;
}

/**
 * Normalize an extension argument: ".TS" and "ts" both become "ts".
 */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, "").toLowerCase();
}

function extensionOf(name: string): string {
  return path.extname(name).slice(1).toLowerCase();
}

async function loadScope(dirAbs: string, base: string): Promise<IgnoreScope | null> {
  const matcher = ignore();
  let found = false;

  for (const name of IGNORE_FILES) {
    let content: string;
    try {
      content = await fsp.readFile(path.join(dirAbs, name), "utf8");
    } catch {
      continue;
    }
    matcher.add(content);
    found = true;
  }

  return found ? { base, matcher } : null;
}

function isIgnored(scopes: IgnoreScope[], relPath: string, isDirectory: boolean): boolean {
  let ignored = false;

  for (const scope of scopes) {
    const local = scope.base ? path.posix.relative(scope.base, relPath) : relPath;
    const result = scope.matcher.test(isDirectory ? `${local}/` : local);
    if (result.ignored) ignored = true;
    else if (result.unignored) ignored = false;
  }

  return ignored;
}

/**
 * List every candidate file under `dir`, in walk order (entries sorted by name).
 *
 * @throws CodetypeError PathNotFound when `dir` does not exist,
 *   NotReadable when it is not a readable directory
 */
export async function listFiles(dir: string, options: ListFilesOptions = {}): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const extension = options.extension ? normalizeExtension(options.extension) : undefined;

  let rootEntries: Dirent[];
  try {
    const stat = await fsp.stat(dir);
    if (!stat.isDirectory()) {
      throw new CodetypeError("NotReadable", `${dir}: not a directory`, { path: dir });
    }
    rootEntries = await fsp.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof CodetypeError) throw error;
    throw fromFsError(error, dir, "read directory");
  }

  const files: string[] = [];

  async function walk(dirAbs: string, relDir: string, entries: Dirent[], parentScopes: IgnoreScope[]) {
    const scope = await loadScope(dirAbs, relDir);
    const scopes = scope ? [...parentScopes, scope] : parentScopes;

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name === ".git") continue;
      if (!options.hidden && entry.name.startsWith(".")) continue;

      const relPath = relDir ? path.posix.join(relDir, entry.name) : entry.name;
      const absPath = path.join(dirAbs, entry.name);

      if (entry.isDirectory()) {
        if (isIgnored(scopes, relPath, true)) continue;

        let children: Dirent[];
        try {
          children = await fsp.readdir(absPath, { withFileTypes: true });
        } catch (error) {
          logger.debug("Skipping unreadable directory", { path: absPath, error: String(error) });
          continue;
        }
        await walk(absPath, relPath, children, scopes);
      } else if (entry.isFile()) {
        const fileExtension = extensionOf(entry.name);
        if (!fileExtension) continue;
        if (extension !== undefined && fileExtension !== extension) continue;
        if (isIgnored(scopes, relPath, false)) continue;
        files.push(absPath);
      }
    }
  }

  await walk(dir, "", rootEntries, []);
  logger.debug("Listed candidate files", { dir, extension, count: files.length });
  return files;
}
