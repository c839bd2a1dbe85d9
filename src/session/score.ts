/**
 * Scoring
 *
 * Speed and accuracy from the target, the input and the elapsed time.
 * A "word" is five characters, as typing tests standardize it.
 */

import type { FinishReason, Score, Stats, WpmSample } from "./types";

export interface KeyCounters {
  keystrokes: number;
  backspaces: number;
  errors: number;
}

/** Positions where input and target agree */
export function countCorrect(target: readonly string[], input: readonly string[]): number {
  let correct = 0;
  for (let i = 0; i < input.length && i < target.length; i++) {
    if (input[i] === target[i]) correct++;
  }
  return correct;
}

/**
 * (chars / 5) / minutes, written to stay exact for whole numbers.
 * Zero while no time has elapsed.
 */
export function wordsPerMinute(typedChars: number, elapsedMs: number): number {
  if (elapsedMs <= 0) return 0;
  return (typedChars * 12_000) / elapsedMs;
}

export function computeStats(
  target: readonly string[],
  input: readonly string[],
  elapsedMs: number,
  counters: KeyCounters
): Stats {
  const correctChars = countCorrect(target, input);
  const { keystrokes, backspaces, errors } = counters;

  return {
    correctChars,
    typedChars: input.length,
    targetChars: target.length,
    keystrokes,
    backspaces,
    errors,
    accuracy: target.length > 0 ? correctChars / target.length : 0,
    keystrokeAccuracy: keystrokes > 0 ? (keystrokes - errors) / keystrokes : 1,
    wpm: wordsPerMinute(input.length, elapsedMs),
    elapsedMs,
  };
}

export function computeScore(stats: Stats, reason: FinishReason, samples: readonly WpmSample[]): Score {
  const peakWpm = samples.reduce((max, sample) => Math.max(max, sample.wpm), stats.wpm);

  return {
    ...stats,
    reason,
    completed: stats.typedChars === stats.targetChars,
    peakWpm,
  };
}
