import { describe, test, expect, beforeEach } from "vitest";
import { TypingSession } from "./session";
import { keysFromText } from "../ui/input";
import type { KeyEvent, SessionConfig } from "./types";

let clock = 0;
const now = () => clock;

function createSession(text: string, config: Partial<SessionConfig> = {}): TypingSession {
  return new TypingSession(text, { timeLimitMs: 30_000, now, ...config });
}

function typeText(session: TypingSession, text: string) {
  for (const event of keysFromText(text)) {
    session.handleKey(event);
  }
}

const backspace: KeyEvent = { type: "backspace" };

beforeEach(() => {
  clock = 0;
});

describe("state transitions", () => {
  test("not_started -> running -> finished", () => {
    const session = createSession("cat");
    expect(session.status).toBe("not_started");

    clock = 100;
    session.start();
    const state = session.getState();
    expect(state.status).toBe("running");
    if (state.status === "running") {
      expect(state.startTime).toBe(100);
    }

    session.cancel();
    expect(session.status).toBe("finished");
  });

  test("invalid transition throws error", () => {
    const session = createSession("cat");
    expect(() => session.reset()).toThrow(/Invalid state transition/);

    session.start();
    expect(() => session.start()).toThrow(
      "Invalid state transition: running -> running. Valid transitions from running: finished"
    );
  });

  test("first keystroke starts the clock", () => {
    const session = createSession("cat");
    clock = 250;
    session.handleKey({ type: "char", char: "c" });

    const state = session.getState();
    expect(state.status).toBe("running");
    if (state.status === "running") {
      expect(state.startTime).toBe(250);
    }
    expect(session.getInput()).toBe("c");
  });

  test("reset returns a finished session to not_started with empty input", () => {
    const session = createSession("cat");
    typeText(session, "cat");
    expect(session.status).toBe("finished");

    session.reset();
    expect(session.status).toBe("not_started");
    expect(session.getInput()).toBe("");
    expect(session.getScore()).toBeNull();
    expect(session.getSamples()).toEqual([]);
  });

  test("reset can change the time limit of the next round", () => {
    const session = createSession("cat", { timeLimitMs: 30_000 });
    typeText(session, "cat");

    session.reset(60_000);
    expect(session.remainingMs()).toBe(60_000);
    expect(session.view().timeLimitMs).toBe(60_000);
  });

  test("arrow keys neither start nor change a session", () => {
    const session = createSession("cat");
    expect(session.handleKey({ type: "right" })).toBe(false);
    expect(session.status).toBe("not_started");

    session.start();
    expect(session.handleKey({ type: "left" })).toBe(false);
    expect(session.getInput()).toBe("");
  });
});

describe("typing", () => {
  test("correct retype of 'cat' finishes with accuracy 1", () => {
    const session = createSession("cat");
    session.start();
    typeText(session, "cat");

    const score = session.getScore();
    expect(session.status).toBe("finished");
    expect(score?.accuracy).toBe(1);
    expect(score?.reason).toBe("completed");
    expect(score?.completed).toBe(true);
    expect(score?.errors).toBe(0);
  });

  test("'cxt' for 'cat' scores 2/3", () => {
    const session = createSession("cat");
    session.start();
    typeText(session, "cxt");

    const score = session.getScore();
    expect(score?.accuracy).toBe(2 / 3);
    expect(score?.correctChars).toBe(2);
    expect(score?.errors).toBe(1);
    expect(score?.keystrokeAccuracy).toBe(2 / 3);
  });

  test("mistakes can be corrected with backspace", () => {
    const session = createSession("cat");
    session.start();
    typeText(session, "cx");
    expect(session.charState(1)).toBe("incorrect");

    session.handleKey(backspace);
    expect(session.charState(1)).toBe("untyped");
    typeText(session, "at");

    const score = session.getScore();
    expect(score?.accuracy).toBe(1);
    expect(score?.keystrokes).toBe(4);
    expect(score?.errors).toBe(1);
    expect(score?.backspaces).toBe(1);
    expect(score?.keystrokeAccuracy).toBe(0.75);
  });

  test("backspace on empty input is a no-op", () => {
    const session = createSession("cat");
    session.start();
    expect(session.handleKey(backspace)).toBe(false);
    expect(session.stats().backspaces).toBe(0);
  });

  test("input never grows past the target", () => {
    const session = createSession("abcd");
    session.start();
    const keys = keysFromText("ab\x7fzzzzzz\x7f\x7fqq");

    for (const key of keys) {
      session.handleKey(key);
      expect(session.getInput().length).toBeLessThanOrEqual(4);
    }
    expect(session.getInput()).toBe("azzz");
    expect(session.status).toBe("finished");
  });

  test("accuracy stays within [0, 1]", () => {
    const session = createSession("abc");
    session.start();
    for (const key of keysFromText("x\x7fa")) {
      session.handleKey(key);
      const { accuracy } = session.stats();
      expect(accuracy).toBeGreaterThanOrEqual(0);
      expect(accuracy).toBeLessThanOrEqual(1);
    }
  });

  test("enter types a newline", () => {
    const session = createSession("a\nb");
    session.start();
    typeText(session, "a\rb");
    expect(session.getScore()?.accuracy).toBe(1);
  });
});

describe("auto-indent", () => {
  test("fills leading whitespace after a correct newline", () => {
    const session = createSession("if x:\n    y");
    session.start();
    typeText(session, "if x:\r");
    expect(session.getInput()).toBe("if x:\n    ");

    typeText(session, "y");
    const score = session.getScore();
    expect(score?.completed).toBe(true);
    expect(score?.typedChars).toBe(11);
    expect(score?.keystrokes).toBe(7);
  });

  test("fills the indentation of the first line on start", () => {
    const session = createSession("  x");
    session.start();
    expect(session.getInput()).toBe("  ");
  });

  test("does not fill after a mistyped newline", () => {
    const session = createSession("ab\n  c");
    session.start();
    typeText(session, "a\r");
    expect(session.getInput()).toBe("a\n");
  });

  test("can be turned off", () => {
    const session = createSession("a\n  b", { autoIndent: false });
    session.start();
    typeText(session, "a\r");
    expect(session.getInput()).toBe("a\n");
  });
});

describe("tab", () => {
  test("fills up to tabWidth spaces of the target", () => {
    const session = createSession("a\n        b", { autoIndent: false, tabWidth: 4 });
    session.start();
    typeText(session, "a\r\t\tb");

    const score = session.getScore();
    expect(score?.accuracy).toBe(1);
    expect(score?.keystrokes).toBe(5);
  });

  test("types a literal tab where the target has no space", () => {
    const session = createSession("ab");
    session.start();
    typeText(session, "\t");
    expect(session.getInput()).toBe("\t");
    expect(session.charState(0)).toBe("incorrect");
  });

  test("tabs in the excerpt are expanded", () => {
    const session = createSession("\tx", { tabWidth: 2 });
    expect(session.target.join("")).toBe("  x");
  });

  test("control characters in the excerpt become typeable spaces", () => {
    const session = createSession("a\fb\u000bc\u007fd\u0085e\u0000");
    expect(session.target.join("")).toBe("a b c d e");

    session.start();
    typeText(session, "a b c d e");
    expect(session.getScore()?.accuracy).toBe(1);
  });
});

describe("time limit", () => {
  test("no keystrokes: finishes once the limit elapses", () => {
    const session = createSession("some code", { timeLimitMs: 1000 });
    session.start();

    clock = 999;
    session.tick();
    expect(session.status).toBe("running");

    clock = 1000;
    session.tick();
    const score = session.getScore();
    expect(session.status).toBe("finished");
    expect(score?.reason).toBe("timeout");
    expect(score?.accuracy).toBe(0);
    expect(score?.wpm).toBe(0);
  });

  test("elapsed time is capped at the limit", () => {
    const session = createSession("abcd", { timeLimitMs: 2000 });
    session.start();
    typeText(session, "ab");

    clock = 5000;
    session.handleKey({ type: "char", char: "c" });

    const score = session.getScore();
    expect(score?.reason).toBe("timeout");
    expect(score?.elapsedMs).toBe(2000);
    expect(score?.typedChars).toBe(2);
    expect(score?.wpm).toBe(12);
  });

  test("remaining time counts down from the limit", () => {
    const session = createSession("abc", { timeLimitMs: 10_000 });
    expect(session.remainingMs()).toBe(10_000);
    session.start();
    clock = 2500;
    expect(session.remainingMs()).toBe(7500);
  });
});

describe("scoring", () => {
  test("wpm is characters / 5 per minute", () => {
    const session = createSession("hello world");
    session.start();
    clock = 6000;
    typeText(session, "hello world");

    expect(session.getScore()?.wpm).toBe(22);
  });

  test("takes one sample per second of running time", () => {
    const session = createSession("abcdef", { timeLimitMs: 3000 });
    session.start();
    clock = 500;
    typeText(session, "ab");
    clock = 2500;
    session.tick();

    expect(session.getSamples()).toEqual([
      { elapsedMs: 1000, wpm: 24, accuracy: 2 / 6 },
      { elapsedMs: 2000, wpm: 12, accuracy: 2 / 6 },
    ]);

    clock = 3000;
    session.tick();
    const score = session.getScore();
    expect(score?.wpm).toBe(8);
    expect(score?.peakWpm).toBe(24);
  });

  test("escape ends a running session with a partial score", () => {
    const session = createSession("abcd");
    session.start();
    clock = 3000;
    typeText(session, "ab\x1b");

    const score = session.getScore();
    expect(score?.reason).toBe("cancelled");
    expect(score?.completed).toBe(false);
    expect(score?.accuracy).toBe(0.5);
    expect(score?.wpm).toBe(8);
  });

  test("escape before the start leaves the session untouched", () => {
    const session = createSession("abcd");
    expect(session.handleKey({ type: "escape" })).toBe(false);
    expect(session.status).toBe("not_started");
  });
});
