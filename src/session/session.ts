/**
 * Typing Session
 *
 * Owns the target and input buffers and moves through
 * not_started -> running -> finished, validating every transition against
 * VALID_TRANSITIONS. Time is read from the injected clock on every key and
 * tick; nothing runs in the background.
 */

import { computeScore, computeStats, wordsPerMinute, countCorrect } from "./score";
import { prepareTarget, toChars } from "./target";
import type {
  CharState,
  FinishReason,
  KeyEvent,
  Score,
  SessionConfig,
  SessionState,
  SessionView,
  Stats,
  WpmSample,
} from "./types";
import { DEFAULT_SESSION_CONFIG, VALID_TRANSITIONS, isValidTransition } from "./types";

const SAMPLE_INTERVAL_MS = 1000;

export class TypingSession {
  readonly target: readonly string[];
  private config: SessionConfig;
  private input: string[] = [];
  private state: SessionState = { status: "not_started" };
  private keystrokes = 0;
  private backspaces = 0;
  private errors = 0;
  private samples: WpmSample[] = [];

  /**
   * @param text Excerpt to type; tabs are expanded and trailing whitespace dropped
   * @throws CodetypeError EmptyFile when nothing typeable remains
   */
  constructor(text: string, config: Partial<SessionConfig> = {}) {
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
    this.target = toChars(prepareTarget(text, this.config.tabWidth));
  }

  /**
   * Transition to a new state with validation.
   * Throws descriptive error if transition is invalid.
   */
  private transition(newState: SessionState): void {
    const currentStatus = this.state.status;
    const validNextStates = VALID_TRANSITIONS[currentStatus];

    if (!isValidTransition(currentStatus, newState.status)) {
      throw new Error(
        `Invalid state transition: ${currentStatus} -> ${newState.status}. ` +
          `Valid transitions from ${currentStatus}: ${validNextStates.join(", ")}`
      );
    }

    this.state = newState;
  }

  /**
   * Start the clock. Called by the runner when the first frame is shown,
   * or implicitly by the first keystroke.
   */
  start(): void {
    this.transition({ status: "running", startTime: this.config.now() });
    this.autoIndent();
  }

  /**
   * Apply one key press. Returns true when the session changed.
   * Escape and Ctrl+C end a running session with a partial score; before
   * the start they are left to the caller.
   */
  handleKey(event: KeyEvent): boolean {
    if (this.state.status === "finished") return false;

    if (this.state.status === "not_started") {
      switch (event.type) {
        case "escape":
        case "interrupt":
        case "left":
        case "right":
        case "unknown":
          return false;
      }
      this.start();
    }

    this.tick();
    if (this.state.status !== "running") return true;

    switch (event.type) {
      case "char":
        return this.type(event.char);
      case "enter":
        return this.type("\n");
      case "tab":
        return this.typeTab();
      case "backspace":
        return this.backspace();
      case "escape":
      case "interrupt":
        this.finish("cancelled");
        return true;
      case "left":
      case "right":
      case "unknown":
        return false;
    }
  }

  /**
   * Advance time: take due WPM samples and end the session once the time
   * limit is reached.
   */
  tick(): void {
    if (this.state.status !== "running") return;

    const elapsed = this.config.now() - this.state.startTime;
    const limit = this.config.timeLimitMs;

    let due = (this.samples.length + 1) * SAMPLE_INTERVAL_MS;
    while (due <= elapsed && due <= limit) {
      this.samples.push({
        elapsedMs: due,
        wpm: wordsPerMinute(this.input.length, due),
        accuracy: countCorrect(this.target, this.input) / this.target.length,
      });
      due += SAMPLE_INTERVAL_MS;
    }

    if (elapsed >= limit) {
      this.finish("timeout");
    }
  }

  /**
   * End a running session early. The partial score is kept.
   */
  cancel(): void {
    if (this.state.status === "running") {
      this.finish("cancelled");
    }
  }

  /**
   * Back to not_started with the same target, optionally under a new
   * time limit.
   */
  reset(timeLimitMs: number = this.config.timeLimitMs): void {
    this.transition({ status: "not_started" });
    this.config = { ...this.config, timeLimitMs };
    this.input = [];
    this.keystrokes = 0;
    this.backspaces = 0;
    this.errors = 0;
    this.samples = [];
  }

  get status(): SessionState["status"] {
    return this.state.status;
  }

  getState(): Readonly<SessionState> {
    return this.state;
  }

  getInput(): string {
    return this.input.join("");
  }

  getScore(): Score | null {
    return this.state.status === "finished" ? this.state.score : null;
  }

  getSamples(): readonly WpmSample[] {
    return this.samples;
  }

  charState(index: number): CharState {
    const typed = this.input[index];
    if (typed === undefined) return "untyped";
    return typed === this.target[index] ? "correct" : "incorrect";
  }

  /**
   * Running time, capped at the time limit.
   */
  elapsedMs(): number {
    const state = this.state;
    switch (state.status) {
      case "not_started":
        return 0;
      case "running":
        return Math.min(this.config.now() - state.startTime, this.config.timeLimitMs);
      case "finished":
        return Math.min(state.endTime - state.startTime, this.config.timeLimitMs);
    }
  }

  remainingMs(): number {
    return Math.max(0, this.config.timeLimitMs - this.elapsedMs());
  }

  stats(): Stats {
    return computeStats(this.target, this.input, this.elapsedMs(), {
      keystrokes: this.keystrokes,
      backspaces: this.backspaces,
      errors: this.errors,
    });
  }

  view(): SessionView {
    return {
      status: this.state.status,
      target: this.target,
      input: this.input,
      timeLimitMs: this.config.timeLimitMs,
      remainingMs: this.remainingMs(),
      stats: this.stats(),
      score: this.getScore(),
      samples: this.samples,
    };
  }

  private type(char: string): boolean {
    if (this.input.length >= this.target.length) return false;

    const position = this.input.length;
    this.input.push(char);
    this.keystrokes++;
    if (char !== this.target[position]) this.errors++;

    if (char === "\n" && this.target[position] === "\n") {
      this.autoIndent();
    }
    this.finishIfComplete();
    return true;
  }

  /** Tab fills the run of target spaces at the cursor, up to tabWidth */
  private typeTab(): boolean {
    if (this.input.length >= this.target.length) return false;

    let spaces = 0;
    while (
      spaces < this.config.tabWidth &&
      this.target[this.input.length + spaces] === " "
    ) {
      spaces++;
    }

    if (spaces === 0) return this.type("\t");

    for (let i = 0; i < spaces; i++) this.input.push(" ");
    this.keystrokes++;
    this.finishIfComplete();
    return true;
  }

  private backspace(): boolean {
    if (this.input.length === 0) return false;
    this.input.pop();
    this.backspaces++;
    return true;
  }

  private autoIndent(): void {
    if (!this.config.autoIndent) return;
    while (this.input.length < this.target.length && this.target[this.input.length] === " ") {
      this.input.push(" ");
    }
    this.finishIfComplete();
  }

  private finishIfComplete(): void {
    if (this.state.status === "running" && this.input.length >= this.target.length) {
      this.finish("completed");
    }
  }

  private finish(reason: FinishReason): void {
    if (this.state.status !== "running") return;

    const startTime = this.state.startTime;
    const endTime = this.config.now();
    const elapsedMs = Math.min(endTime - startTime, this.config.timeLimitMs);
    const stats = computeStats(this.target, this.input, elapsedMs, {
      keystrokes: this.keystrokes,
      backspaces: this.backspaces,
      errors: this.errors,
    });

    this.transition({
      status: "finished",
      startTime,
      endTime,
      score: computeScore(stats, reason, this.samples),
    });
  }
}
