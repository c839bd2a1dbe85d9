/**
 * Excerpt Types
 */

/** Bounded slice of a source file presented as the typing target */
export interface Excerpt {
  /** File the excerpt was read from */
  path: string;
  /** First lines of the file joined by "\n" */
  text: string;
  /** Number of lines in `text` */
  lineCount: number;
  /** Number of lines in the whole file */
  totalLines: number;
  /** Whether the file had more lines than the excerpt */
  truncated: boolean;
}

/** Bytes inspected for NUL characters when detecting binary content */
export const BINARY_SNIFF_BYTES = 8192;

export const DEFAULT_MAX_LINES = 20;
