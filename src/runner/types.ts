/**
 * Runner Types
 */

import type { Excerpt } from "../excerpt/types";
import type { Logger } from "../logger";
import type { Score, SessionConfig } from "../session/types";
import type { Theme } from "../ui/types";

export interface RunnerOptions {
  /** Terminal ink reads keys from; must support raw mode */
  input: NodeJS.ReadStream;
  output: NodeJS.WriteStream;
  theme: Theme;
  /** Excerpt for the first round */
  excerpt: Excerpt;
  /** Picks and reads another excerpt for the "new file" key */
  nextExcerpt: () => Promise<Excerpt>;
  session: Partial<SessionConfig>;
  logger?: Logger;
  /** Milliseconds between timer ticks (default: 100) */
  tickMs?: number;
}

export interface RunResult {
  /** Score of the last finished round, null when none finished */
  score: Score | null;
  /** File of the last round */
  filePath: string;
  /** Rounds started, restarts included */
  rounds: number;
}

/** Keys handled on the result screen */
export const RESTART_KEY = "r";
export const NEW_FILE_KEY = "n";
export const QUIT_KEY = "q";

export const DEFAULT_TICK_MS = 100;
