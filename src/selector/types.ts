/**
 * File Selector Types
 */

import type { Logger } from "../logger";

/** Options for enumerating candidate files under a directory */
export interface ListFilesOptions {
  /** Only keep files with this extension (compared case-insensitively, leading dot optional) */
  extension?: string;
  /** Include dot-files and dot-directories */
  hidden?: boolean;
  logger?: Logger;
}

/** Options for picking the file to type */
export interface SelectorOptions extends ListFilesOptions {
  /** Root directory to sample from */
  dir: string;
  /** Explicit file; bypasses the directory walk and all filters */
  file?: string;
  /** Random source in [0, 1) */
  random: () => number;
}

/** Ignore files read from every directory during the walk */
export const IGNORE_FILES = [".gitignore", ".ignore"] as const;
