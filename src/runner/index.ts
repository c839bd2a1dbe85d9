/**
 * Runner Module
 *
 * Drives rounds of typing: the RoundController applies keys and ticks to
 * the session, and the SessionRunner renders it with ink until the user
 * quits.
 */

export { SessionRunner } from "./runner";
export { RoundController } from "./controller";
export type { RoundControllerOptions } from "./controller";
export { nextTimeLimit, prevTimeLimit, timeChoices, PRESET_TIME_LIMITS } from "./time";
export * from "./types";
