/**
 * UI Module
 *
 * The ink front end:
 * - App: root component wired to a RoundController
 * - Frame: draws one laid-out frame with a theme
 * - layout: pure session view -> styled rows
 * - Themes, key mapping and terminal output watching
 */

export { App } from "./App";
export type { AppProps } from "./App";
export { Frame } from "./Frame";
export { RenderGuard } from "./RenderGuard";
export { formatClock, formatPercent, renderFrame, sparkline } from "./layout";
export { keysFromText, toKeyEvents } from "./input";
export { watchOutput } from "./output";
export { DEFAULT_THEME, THEMES, resolveTheme } from "./themes";
export type { ThemeName } from "./themes";
export * from "./types";
