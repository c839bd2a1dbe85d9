/**
 * Typing Session Types
 *
 * Defines the session state machine using TypeScript discriminated unions.
 * Each state has a unique `status` field that TypeScript uses for narrowing.
 */

/** Why a session ended */
export type FinishReason = "completed" | "timeout" | "cancelled";

/** Live speed and accuracy figures, computed at any point of a session */
export interface Stats {
  /** Positions where the input matches the target */
  correctChars: number;
  /** Length of the input buffer */
  typedChars: number;
  /** Length of the target buffer */
  targetChars: number;
  /** Characters entered by the user (auto-indent excluded) */
  keystrokes: number;
  backspaces: number;
  /** Keystrokes that did not match the target at their position */
  errors: number;
  /** correctChars / targetChars, in [0, 1] */
  accuracy: number;
  /** (keystrokes - errors) / keystrokes, 1 before any keystroke */
  keystrokeAccuracy: number;
  /** (typedChars / 5) per elapsed minute */
  wpm: number;
  /** Elapsed running time, capped at the time limit */
  elapsedMs: number;
}

/** Final result of a session */
export interface Score extends Stats {
  reason: FinishReason;
  /** The whole target was typed */
  completed: boolean;
  /** Highest WPM seen in the per-second samples or at the end */
  peakWpm: number;
}

/** Speed/accuracy snapshot taken once per second of running time */
export interface WpmSample {
  elapsedMs: number;
  wpm: number;
  accuracy: number;
}

/**
 * Session state discriminated union
 */
export type SessionState =
  | { status: "not_started" }
  | { status: "running"; startTime: number }
  | { status: "finished"; startTime: number; endTime: number; score: Score };

/**
 * Union of all possible session status values
 */
export type SessionStatus = SessionState["status"];

/** Per-character highlighting class */
export type CharState = "correct" | "incorrect" | "untyped";

/**
 * Session configuration. The clock is injected so that tests control time.
 */
export interface SessionConfig {
  /** Time limit in milliseconds */
  timeLimitMs: number;
  /** Spaces a tab expands to in the target, and the most a Tab key fills */
  tabWidth: number;
  /** Fill the leading whitespace of each line automatically */
  autoIndent: boolean;
  /** Wall clock in milliseconds */
  now: () => number;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  timeLimitMs: 30_000,
  tabWidth: 4,
  autoIndent: true,
  now: Date.now,
};

/** Everything the renderer needs to draw one frame */
export interface SessionView {
  status: SessionStatus;
  target: readonly string[];
  input: readonly string[];
  timeLimitMs: number;
  remainingMs: number;
  stats: Stats;
  score: Score | null;
  samples: readonly WpmSample[];
}

/**
 * Decoded key press. Left and right only matter on the result screen,
 * where they pick the time limit of the next round.
 */
export type KeyEvent =
  | { type: "char"; char: string }
  | { type: "enter" }
  | { type: "tab" }
  | { type: "backspace" }
  | { type: "escape" }
  | { type: "interrupt" }
  | { type: "left" }
  | { type: "right" }
  | { type: "unknown"; sequence: string };

/**
 * Valid state transitions map
 *
 *   not_started ──► running ──► finished
 *        ▲                         │
 *        └──────── reset ──────────┘
 */
export const VALID_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  not_started: ["running"],
  running: ["finished"],
  finished: ["not_started"],
};

/**
 * Type guard to check if a transition is valid
 */
export function isValidTransition(from: SessionStatus, to: SessionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
