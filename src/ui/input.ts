/**
 * Key Mapping
 *
 * Turns what ink's useInput reports into session key events. ink decodes
 * the escape sequences; a chunk of plain text (fast typing, paste) still
 * arrives as one input and is split here, one event per character.
 */

import type { Key } from "ink";
import type { KeyEvent } from "../session/types";

/** The flags of ink's Key that decide the mapping */
export type KeyFlags = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "tab"
  | "backspace"
  | "delete"
  | "meta"
>;

export function keysFromText(text: string): KeyEvent[] {
  const chars = Array.from(text);
  const events: KeyEvent[] = [];

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i] ?? "";

    switch (char) {
      case "\x03":
        events.push({ type: "interrupt" });
        continue;
      case "\r":
        events.push({ type: "enter" });
        if (chars[i + 1] === "\n") i++;
        continue;
      case "\n":
        events.push({ type: "enter" });
        continue;
      case "\t":
        events.push({ type: "tab" });
        continue;
      case "\x7f":
      case "\b":
        events.push({ type: "backspace" });
        continue;
      case "\x1b":
        events.push({ type: "escape" });
        continue;
    }

    const code = char.codePointAt(0) ?? 0;
    if (code < 0x20 || (code >= 0x80 && code < 0xa0)) {
      events.push({ type: "unknown", sequence: char });
    } else {
      events.push({ type: "char", char });
    }
  }

  return events;
}

export function toKeyEvents(input: string, key: KeyFlags): KeyEvent[] {
  if (key.ctrl) {
    return input === "c" ? [{ type: "interrupt" }] : [{ type: "unknown", sequence: input }];
  }
  if (key.escape) return [{ type: "escape" }];
  if (key.leftArrow) return [{ type: "left" }];
  if (key.rightArrow) return [{ type: "right" }];
  if (key.upArrow || key.downArrow || key.pageUp || key.pageDown) {
    return [{ type: "unknown", sequence: input }];
  }
  if (key.return) return [{ type: "enter" }];
  if (key.tab) return [{ type: "tab" }];
  if (key.backspace || key.delete) return [{ type: "backspace" }];

  // ESC followed by a key in the same read: ink reports it as meta + key
  if (key.meta && input !== "") {
    return [{ type: "escape" }, ...keysFromText(input)];
  }
  return keysFromText(input);
}
