/**
 * Themes
 */

import { CodetypeError } from "../errors";
import type { Theme } from "./types";

export const THEMES = {
  dark: {
    name: "dark",
    styles: {
      text: { color: "white" },
      correct: { color: "whiteBright" },
      incorrect: { color: "whiteBright", backgroundColor: "red" },
      untyped: { color: "gray" },
      cursor: { inverse: true },
      dim: { color: "gray" },
      accent: { color: "yellow", bold: true },
      warning: { color: "red", bold: true },
    },
  },
  light: {
    name: "light",
    styles: {
      text: { color: "black" },
      correct: { color: "black" },
      incorrect: { color: "whiteBright", backgroundColor: "red" },
      untyped: { color: "gray" },
      cursor: { inverse: true },
      dim: { color: "gray", dimColor: true },
      accent: { color: "blue", bold: true },
      warning: { color: "red", bold: true },
    },
  },
} satisfies Record<string, Theme>;

export type ThemeName = keyof typeof THEMES;

export const DEFAULT_THEME: ThemeName = "dark";

function isThemeName(name: string): name is ThemeName {
  return Object.hasOwn(THEMES, name);
}

/**
 * @throws CodetypeError InvalidArgument for an unknown theme name
 */
export function resolveTheme(name: string): Theme {
  const key = name.toLowerCase();
  if (!isThemeName(key)) {
    throw new CodetypeError(
      "InvalidArgument",
      `unknown theme "${name}" (available: ${Object.keys(THEMES).join(", ")})`
    );
  }
  return THEMES[key];
}
