/**
 * Round Controller
 *
 * Runs the rounds of one session without touching the terminal. Key
 * events and timer ticks go in; every change is announced to subscribers,
 * and the ink app redraws from `view()`. The session clock advances by
 * timestamps, so the tick interval only bounds how late a timeout is
 * noticed.
 */

import type { Excerpt } from "../excerpt/types";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { TypingSession } from "../session/session";
import type { KeyEvent, Score, SessionConfig, SessionView } from "../session/types";
import { DEFAULT_SESSION_CONFIG } from "../session/types";
import type { TimeChoices } from "../ui/types";
import { nextTimeLimit, prevTimeLimit, timeChoices } from "./time";
import type { RunResult } from "./types";
import { NEW_FILE_KEY, QUIT_KEY, RESTART_KEY } from "./types";

export interface RoundControllerOptions {
  /** Excerpt for the first round */
  excerpt: Excerpt;
  /** Picks and reads another excerpt for the "new file" key */
  nextExcerpt: () => Promise<Excerpt>;
  session: Partial<SessionConfig>;
  logger?: Logger;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class RoundController {
  private readonly options: RoundControllerOptions;
  private readonly logger: Logger;
  private readonly listeners = new Set<() => void>();
  private readonly timeLimits: readonly number[];
  private timeLimitMs: number;
  private excerpt: Excerpt;
  private session: TypingSession;
  private lastScore: Score | null = null;
  private rounds = 0;
  private started = false;
  private loading = false;
  private outcome: { error: Error | null } | null = null;

  /**
   * @throws CodetypeError EmptyFile when the first excerpt has nothing to type
   */
  constructor(options: RoundControllerOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.timeLimitMs = options.session.timeLimitMs ?? DEFAULT_SESSION_CONFIG.timeLimitMs;
    this.timeLimits = timeChoices(Math.max(1, Math.round(this.timeLimitMs / 1000)));
    this.excerpt = options.excerpt;
    this.session = this.createSession(options.excerpt);
  }

  /**
   * Start the first round. The clock runs right away so an idle round
   * still times out.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.guard(() => this.startRound());
    this.changed();
  }

  handleKeys(events: readonly KeyEvent[]): void {
    this.guard(() => {
      for (const event of events) {
        if (this.outcome) return;
        this.handleKey(event);
      }
    });
    this.changed();
  }

  tick(): void {
    this.guard(() => {
      if (this.session.status === "running") {
        this.session.tick();
        this.recordScore();
      }
    });
    this.changed();
  }

  /**
   * Stop from outside (signal handlers). A running round is cancelled first
   * so its partial score is returned.
   */
  stop(reason: string): void {
    if (this.outcome) return;
    this.logger.debug("Runner stopped", { reason });
    this.session.cancel();
    this.recordScore();
    this.finishRun(null);
  }

  /** Called on every change; returns the unsubscribe function */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isDone(): boolean {
    return this.outcome !== null;
  }

  /** Error that ended the run, if one did */
  get failure(): Error | null {
    return this.outcome?.error ?? null;
  }

  get filePath(): string {
    return this.excerpt.path;
  }

  /** Current session, for inspection */
  getSession(): TypingSession {
    return this.session;
  }

  view(): SessionView {
    return this.session.view();
  }

  limits(): TimeChoices {
    return { choices: this.timeLimits, selected: Math.round(this.timeLimitMs / 1000) };
  }

  result(): RunResult {
    return { score: this.lastScore, filePath: this.excerpt.path, rounds: this.rounds };
  }

  private handleKey(key: KeyEvent): void {
    if (this.loading) return;

    switch (this.session.status) {
      case "not_started":
        if (key.type === "escape" || key.type === "interrupt") {
          this.finishRun(null);
          return;
        }
        this.session.handleKey(key);
        break;

      case "running":
        this.session.handleKey(key);
        this.recordScore();
        break;

      case "finished":
        this.handleResultKey(key);
        break;
    }
  }

  private handleResultKey(key: KeyEvent): void {
    if (key.type === "escape" || key.type === "interrupt") {
      this.finishRun(null);
      return;
    }
    if (key.type === "left" || key.type === "right") {
      const step = key.type === "left" ? prevTimeLimit : nextTimeLimit;
      this.selectTimeLimit(step(this.timeLimits, this.limits().selected));
      return;
    }
    if (key.type !== "char") return;

    switch (key.char.toLowerCase()) {
      case QUIT_KEY:
        this.finishRun(null);
        break;
      case RESTART_KEY:
        this.session.reset(this.timeLimitMs);
        this.startRound();
        break;
      case NEW_FILE_KEY:
        void this.loadNext();
        break;
    }
  }

  /** Applies to the next round, started with r or n */
  private selectTimeLimit(seconds: number): void {
    this.timeLimitMs = seconds * 1000;
    this.logger.debug("Time limit selected", { seconds });
  }

  private async loadNext(): Promise<void> {
    this.loading = true;
    let next: { excerpt: Excerpt; session: TypingSession } | null = null;
    try {
      const excerpt = await this.options.nextExcerpt();
      next = { excerpt, session: this.createSession(excerpt) };
    } catch (error) {
      // Keep the current excerpt; the round restarts with it
      this.logger.debug("Failed to load new excerpt", { error: toError(error).message });
    } finally {
      this.loading = false;
    }

    if (this.outcome) return;
    this.guard(() => {
      if (next) {
        this.excerpt = next.excerpt;
        this.session = next.session;
        this.logger.debug("Loaded new excerpt", { file: next.excerpt.path, lines: next.excerpt.lineCount });
      } else {
        this.session.reset(this.timeLimitMs);
      }
      this.startRound();
    });
    this.changed();
  }

  private createSession(excerpt: Excerpt): TypingSession {
    return new TypingSession(excerpt.text, { ...this.options.session, timeLimitMs: this.timeLimitMs });
  }

  private startRound(): void {
    this.rounds++;
    this.session.start();
    this.logger.debug("Round started", {
      file: this.excerpt.path,
      round: this.rounds,
      timeLimitMs: this.timeLimitMs,
    });
  }

  private recordScore(): void {
    const score = this.session.getScore();
    if (score && score !== this.lastScore) {
      this.lastScore = score;
      this.logger.debug("Round finished", {
        reason: score.reason,
        wpm: Math.round(score.wpm),
        accuracy: score.accuracy,
      });
    }
  }

  /** Run a handler; an exception ends the run with that error */
  private guard(handler: () => void): void {
    if (this.outcome) return;
    try {
      handler();
    } catch (error) {
      this.finishRun(toError(error));
    }
  }

  private finishRun(error: Error | null): void {
    if (this.outcome) return;
    this.outcome = { error };
    this.logger.debug("Runner finished", { rounds: this.rounds, error: error?.message ?? null });
    this.notify();
  }

  /** Announce a change, unless finishing already did */
  private changed(): void {
    if (!this.outcome) this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) listener();
  }
}
