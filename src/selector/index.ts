/**
 * File Selector Module
 *
 * Exports file enumeration and selection:
 * - listFiles: recursive walk honouring ignore files and the extension filter
 * - selectFile: explicit file check or uniform random pick
 */

export { listFiles, normalizeExtension } from "./walk";
export { selectFile, pickRandom } from "./selector";
export * from "./types";
