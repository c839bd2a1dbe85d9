/**
 * Excerpt Module
 *
 * Reads a file and cuts the typing target out of it.
 */

export { readExcerpt, extractLines, decodeText } from "./extractor";
export * from "./types";
