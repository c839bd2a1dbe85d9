/**
 * Time Limit Choices
 *
 * The result screen cycles through the preset limits plus the one given
 * on the command line, in ascending order, wrapping at both ends.
 */

export const PRESET_TIME_LIMITS = [15, 30, 60, 120] as const;

/** Presets and the custom limit, sorted, without duplicates (seconds) */
export function timeChoices(customSeconds: number): number[] {
  return [...new Set<number>([...PRESET_TIME_LIMITS, customSeconds])].sort((a, b) => a - b);
}

export function nextTimeLimit(choices: readonly number[], current: number): number {
  const index = choices.indexOf(current);
  return choices[index < 0 ? 0 : (index + 1) % choices.length] ?? current;
}

export function prevTimeLimit(choices: readonly number[], current: number): number {
  const index = choices.indexOf(current);
  const last = choices.length - 1;
  return choices[index <= 0 ? last : index - 1] ?? current;
}
