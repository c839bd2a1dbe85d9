/**
 * UI Types
 */

/** Roles a piece of text can be drawn in */
export type StyleRole =
  | "text"
  | "correct"
  | "incorrect"
  | "untyped"
  | "cursor"
  | "dim"
  | "accent"
  | "warning";

/** Props handed to ink's `<Text>` for one role */
export interface TextStyle {
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
  inverse?: boolean;
  dimColor?: boolean;
}

/**
 * Color theme: ink color names and modifiers per role.
 */
export interface Theme {
  name: string;
  styles: Record<StyleRole, TextStyle>;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

/** A run of text drawn in one role */
export interface Segment {
  role: StyleRole;
  text: string;
}

/** One terminal row; an empty array is a blank row */
export type FrameLine = Segment[];

/** Time limits offered on the result screen, in seconds */
export interface TimeChoices {
  choices: readonly number[];
  selected: number;
}

export interface FrameContext {
  size: TerminalSize;
  /** File the excerpt comes from, shown in header and result */
  filePath: string;
  limits: TimeChoices;
}

/** Smallest terminal a frame is laid out for */
export const MIN_COLUMNS = 20;
export const MIN_ROWS = 6;
