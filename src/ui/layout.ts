/**
 * Frame Layout
 *
 * Pure functions from a session view to the rows of one frame, each row a
 * list of styled segments. Widths are terminal cells as measured by
 * string-width, so wide characters take two.
 */

import stringWidth from "string-width";
import type { Score, SessionView } from "../session/types";
import type { FrameContext, FrameLine, Segment, StyleRole } from "./types";
import { MIN_COLUMNS, MIN_ROWS } from "./types";

const SPARK_BARS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"] as const;
const NEWLINE_MARK = "↵";
const ELLIPSIS = "…";

/** Rows taken by the header (title + blank) and the footer (blank + stats + hints) */
const HEADER_ROWS = 2;
const FOOTER_ROWS = 3;

// ink clears the whole screen when a frame is as tall as the terminal
const RESERVED_ROWS = 1;

/** Remaining time at which the clock turns to the warning style */
const LOW_TIME_MS = 5000;

type Part = readonly [StyleRole, string];

/** Build a row, merging neighbours of the same role and dropping empty text */
export function line(...parts: Part[]): FrameLine {
  const segments: Segment[] = [];
  for (const [role, text] of parts) {
    if (text === "") continue;
    const last = segments[segments.length - 1];
    if (last && last.role === role) {
      last.text += text;
    } else {
      segments.push({ role, text });
    }
  }
  return segments;
}

export function lineText(row: FrameLine): string {
  return row.map((segment) => segment.text).join("");
}

/** mm:ss, rounding partial seconds up so the clock reads 00:00 only at the end */
export function formatClock(ms: number): string {
  const total = Math.max(0, Math.ceil(ms / 1000));
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

/**
 * Bars for the last `width` values, scaled to `max` (the highest shown
 * value unless given).
 */
export function sparkline(values: readonly number[], width: number, max?: number): string {
  const shown = values.slice(-Math.max(0, width));
  const top = max ?? shown.reduce((a, b) => Math.max(a, b), 0);
  return shown
    .map((value) => {
      if (top <= 0) return SPARK_BARS[0];
      const ratio = Math.min(1, Math.max(0, value / top));
      return SPARK_BARS[Math.round(ratio * (SPARK_BARS.length - 1))] ?? SPARK_BARS[0];
    })
    .join("");
}

/** Keep the end of a path that is too wide for `width` cells */
function truncateStart(text: string, width: number): string {
  if (stringWidth(text) <= width) return text;
  if (width <= 1) return ELLIPSIS.slice(0, width);

  const chars = Array.from(text);
  let kept = "";
  let used = stringWidth(ELLIPSIS);
  for (let i = chars.length - 1; i >= 0; i--) {
    const char = chars[i] ?? "";
    const charWidth = stringWidth(char);
    if (used + charWidth > width) break;
    kept = char + kept;
    used += charWidth;
  }
  return ELLIPSIS + kept;
}

function spread(left: Part[], right: Part[], width: number): FrameLine {
  const used = [...left, ...right].reduce((total, [, text]) => total + stringWidth(text), 0);
  return line(...left, ["text", " ".repeat(Math.max(1, width - used))], ...right);
}

interface TargetLine {
  /** Index of the line's first character in the target */
  start: number;
  /** Characters of the line, without its newline */
  chars: readonly string[];
}

export function splitTargetLines(target: readonly string[]): TargetLine[] {
  const lines: TargetLine[] = [];
  let start = 0;
  for (let i = 0; i <= target.length; i++) {
    if (i === target.length || target[i] === "\n") {
      lines.push({ start, chars: target.slice(start, i) });
      start = i + 1;
    }
  }
  return lines;
}

function cursorLineIndex(lines: readonly TargetLine[], cursor: number): number {
  for (let i = 0; i < lines.length; i++) {
    const targetLine = lines[i];
    if (targetLine && cursor <= targetLine.start + targetLine.chars.length) return i;
  }
  return lines.length - 1;
}

function charRole(view: SessionView, position: number, cursor: number | null): StyleRole {
  if (position === cursor) return "cursor";
  const typed = view.input[position];
  if (typed === undefined) return "untyped";
  return typed === view.target[position] ? "correct" : "incorrect";
}

/** Cells from `from` onwards that fit in `budget` columns */
function fit(cells: readonly Part[], widths: readonly number[], from: number, budget: number): Part[] {
  const shown: Part[] = [];
  let used = 0;
  for (let i = from; i < cells.length; i++) {
    const cell = cells[i];
    const width = widths[i] ?? 0;
    if (!cell || used + width > budget) break;
    shown.push(cell);
    used += width;
  }
  return shown;
}

function sum(values: readonly number[], end: number): number {
  let total = 0;
  for (let i = 0; i < end; i++) total += values[i] ?? 0;
  return total;
}

function renderTargetLine(
  view: SessionView,
  targetLine: TargetLine,
  lineNumber: number,
  gutterWidth: number,
  isLast: boolean,
  cursor: number | null,
  ctx: FrameContext
): FrameLine {
  const gutter = `${String(lineNumber).padStart(gutterWidth)} │ `;
  // One cell stays free for the newline marker
  const available = Math.max(1, ctx.size.columns - stringWidth(gutter) - 1);

  const cells: Part[] = targetLine.chars.map((char, j): Part => [
    charRole(view, targetLine.start + j, cursor),
    char,
  ]);

  const newlinePosition = targetLine.start + targetLine.chars.length;
  if (newlinePosition === cursor) {
    cells.push(["cursor", " "]);
  } else if (!isLast) {
    const typed = view.input[newlinePosition];
    if (typed !== undefined && typed !== "\n") cells.push(["incorrect", NEWLINE_MARK]);
  }

  const widths = cells.map(([, text]) => stringWidth(text));
  const cursorColumn =
    cursor !== null && cursor >= targetLine.start && cursor <= newlinePosition
      ? cursor - targetLine.start
      : -1;

  let shown = cells;
  if (cursorColumn >= 0 && sum(widths, cursorColumn + 1) > available) {
    // Scroll so the cursor sits at the right edge, behind a leading ellipsis
    let offset = 0;
    let used = sum(widths, cursorColumn + 1);
    while (offset < cursorColumn && used > available - 1) {
      used -= widths[offset] ?? 0;
      offset++;
    }
    shown = [["dim", ELLIPSIS], ...fit(cells, widths, offset, available - 1)];
  } else if (sum(widths, widths.length) > available + 1) {
    shown = [...fit(cells, widths, 0, available), ["dim", ELLIPSIS]];
  }

  return line(["dim", gutter], ...shown);
}

function renderTyping(view: SessionView, ctx: FrameContext): FrameLine[] {
  const { size } = ctx;
  const rows: FrameLine[] = [];

  const clockRole: StyleRole =
    view.status === "running" && view.remainingMs <= LOW_TIME_MS ? "warning" : "text";
  const clock = formatClock(view.remainingMs);
  const title = " codetype ";
  const pathWidth = Math.max(1, size.columns - stringWidth(title) - stringWidth(clock) - 1);
  rows.push(
    spread(
      [["accent", title], ["dim", truncateStart(ctx.filePath, pathWidth)]],
      [[clockRole, clock]],
      size.columns
    )
  );
  rows.push([]);

  const lines = splitTargetLines(view.target);
  const cursor = view.input.length < view.target.length ? view.input.length : null;
  const current = cursorLineIndex(lines, view.input.length);
  const textRows = Math.max(1, size.rows - RESERVED_ROWS - HEADER_ROWS - FOOTER_ROWS);

  let first = 0;
  if (lines.length > textRows) {
    // One line of context above the cursor line
    first = Math.max(0, Math.min(current - 1, lines.length - textRows));
  }

  const gutterWidth = String(lines.length).length;
  for (let i = first; i < Math.min(lines.length, first + textRows); i++) {
    const targetLine = lines[i];
    if (!targetLine) continue;
    rows.push(renderTargetLine(view, targetLine, i + 1, gutterWidth, i === lines.length - 1, cursor, ctx));
  }

  const { stats } = view;
  rows.push([]);
  rows.push(
    line(
      ["text", ` ${Math.round(stats.wpm)} wpm`],
      ["dim", " · "],
      ["text", `${formatPercent(stats.accuracy)} acc`],
      ["dim", " · "],
      ["text", `${stats.typedChars}/${stats.targetChars}`]
    )
  );
  rows.push(
    line(["dim", view.status === "not_started" ? " type to start · esc quit" : " esc finish · ctrl+c quit"])
  );

  return rows;
}

const REASON_LABELS: Record<Score["reason"], string> = {
  completed: "completed",
  timeout: "time is up",
  cancelled: "stopped early",
};

function plural(count: number, word: string): string {
  return `${count} ${count === 1 ? word : `${word}s`}`;
}

function renderResult(view: SessionView, score: Score, ctx: FrameContext): FrameLine[] {
  const { size, limits } = ctx;
  const row = (label: string, value: string, detail = ""): FrameLine =>
    line(["dim", `   ${label.padEnd(12)}`], ["accent", value], ["dim", detail ? `  ${detail}` : ""]);

  const rows: FrameLine[] = [
    line(["accent", " Result"], ["dim", ` · ${REASON_LABELS[score.reason]}`]),
    [],
    row("wpm", String(Math.round(score.wpm))),
    row("accuracy", formatPercent(score.accuracy), `${score.correctChars}/${score.targetChars} chars`),
    row(
      "keystrokes",
      formatPercent(score.keystrokeAccuracy),
      `${plural(score.errors, "error")}, ${plural(score.backspaces, "backspace")}`
    ),
    row("time", formatClock(score.elapsedMs)),
    row("peak wpm", String(Math.round(score.peakWpm))),
  ];

  if (view.samples.length > 0) {
    const width = size.columns - 8;
    rows.push([]);
    rows.push(line(["dim", "   wpm "], ["accent", sparkline(view.samples.map((s) => s.wpm), width)]));
    rows.push(line(["dim", "   acc "], ["accent", sparkline(view.samples.map((s) => s.accuracy), width, 1)]));
  }

  const choices: Part[] = limits.choices.flatMap((seconds, i): Part[] => [
    ["dim", i === 0 ? "" : " "],
    [seconds === limits.selected ? "accent" : "dim", String(seconds)],
  ]);

  rows.push([]);
  rows.push(line(["dim", `   ${"limit".padEnd(12)}`], ...choices, ["dim", "  ←/→"]));
  rows.push(line(["dim", `   ${truncateStart(ctx.filePath, size.columns - 4)}`]));
  rows.push(
    line(
      ["dim", "   "],
      ["accent", "r"],
      ["dim", " restart · "],
      ["accent", "n"],
      ["dim", " new file · "],
      ["warning", "q"],
      ["dim", " quit"]
    )
  );

  return rows;
}

/**
 * Rows of one frame, leaving the bottom row of the terminal free.
 */
export function renderFrame(view: SessionView, ctx: FrameContext): FrameLine[] {
  const { size } = ctx;
  if (size.columns < MIN_COLUMNS || size.rows < MIN_ROWS) {
    return [line(["warning", "terminal too small"])];
  }

  const rows =
    view.status === "finished" && view.score ? renderResult(view, view.score, ctx) : renderTyping(view, ctx);
  return rows.slice(0, size.rows - RESERVED_ROWS);
}
