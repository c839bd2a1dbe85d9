/**
 * Excerpt Extractor
 *
 * Loads a text file and returns its first lines as the typing target.
 * Binary files and bytes that are not valid UTF-8 are rejected.
 */

import fsp from "node:fs/promises";
import { CodetypeError, fromFsError } from "../errors";
import type { Excerpt } from "./types";
import { BINARY_SNIFF_BYTES } from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });

/**
 * Decode file bytes as UTF-8 text.
 *
 * @throws CodetypeError UnsupportedContent for binary or undecodable data
 */
export function decodeText(bytes: Uint8Array, path: string): string {
  const sniff = bytes.subarray(0, BINARY_SNIFF_BYTES);
  if (sniff.includes(0)) {
    throw new CodetypeError("UnsupportedContent", `${path}: binary file`, { path });
  }

  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new CodetypeError("UnsupportedContent", `${path}: not valid UTF-8 text`, {
      path,
      cause: error,
    });
  }
}

/**
 * Split text into lines. "\r\n" and "\n" both end a line, and a final
 * terminator does not start an extra empty line.
 */
export function extractLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Read the first `maxLines` lines of a file.
 *
 * @throws CodetypeError PathNotFound, NotReadable, EmptyFile,
 *   UnsupportedContent or InvalidArgument
 */
export async function readExcerpt(path: string, maxLines: number): Promise<Excerpt> {
  if (!Number.isInteger(maxLines) || maxLines < 1) {
    throw new CodetypeError("InvalidArgument", `line count must be a positive integer, got ${maxLines}`);
  }

  let bytes: Uint8Array;
  try {
    bytes = await fsp.readFile(path);
  } catch (error) {
    throw fromFsError(error, path, "read file");
  }

  const text = decodeText(bytes, path);
  if (text.trim() === "") {
    throw new CodetypeError("EmptyFile", `${path}: file is empty`, { path });
  }

  const lines = extractLines(text);
  const kept = lines.slice(0, maxLines);

  return {
    path,
    text: kept.join("\n"),
    lineCount: kept.length,
    totalLines: lines.length,
    truncated: lines.length > kept.length,
  };
}
