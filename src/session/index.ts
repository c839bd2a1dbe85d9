/**
 * Session Module
 *
 * Exports typing session components:
 * - TypingSession: state machine with validated transitions
 * - Scoring helpers and types: SessionState, Score, Stats, etc.
 */

export { TypingSession } from "./session";
export { prepareTarget, toChars } from "./target";
export { computeStats, computeScore, countCorrect, wordsPerMinute } from "./score";
export type { KeyCounters } from "./score";
export * from "./types";
