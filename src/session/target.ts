/**
 * Target Text Preparation
 *
 * Turns an excerpt into the characters the user has to type. Tabs become
 * spaces and other control characters (form feeds, vertical tabs, DEL, C1
 * codes) become a single space, so that every target character has a key.
 * Trailing whitespace and trailing blank lines are dropped.
 */

import { CodetypeError } from "../errors";

// C0 controls except \t and \n, DEL and the C1 range
const CONTROL_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g;

export function prepareTarget(text: string, tabWidth: number): string {
  const lines = text
    .replace(/\r\n?/g, "\n")
    .replace(/\t/g, " ".repeat(tabWidth))
    .replace(CONTROL_CHARS, " ")
    .split("\n")
    .map((line) => line.trimEnd());

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  const prepared = lines.join("\n");
  if (prepared.trim() === "") {
    throw new CodetypeError("EmptyFile", "nothing to type in the excerpt");
  }
  return prepared;
}

/** Split text into Unicode code points */
export function toChars(text: string): string[] {
  return Array.from(text);
}
