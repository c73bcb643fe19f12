/**
 * Schedule Patterns
 *
 * Parses the fixed cadences used by notes in "scheduled" review mode.
 * A pattern is a comma-separated list of steps such as "1d,1w,2w,1m",
 * or the name of one of the presets below.
 */

// =============================================================================
// Constants
// =============================================================================

/** Days per pattern unit */
const UNIT_DAYS = {
  d: 1,
  w: 7,
  m: 30,
  y: 365,
} as const;

type PatternUnit = keyof typeof UNIT_DAYS;

/**
 * Preset schedule patterns, selectable by name.
 */
export const PRESET_SCHEDULES = {
  /** Intensive learning */
  aggressive: "1d,3d,1w,2w,1m,3m",
  /** Recommended default */
  moderate: "1d,1w,2w,1m,3m,6m",
  /** Long-term retention */
  relaxed: "1w,2w,1m,2m,6m,1y",
} as const;

export type PresetName = keyof typeof PRESET_SCHEDULES;

/** Steps used when a pattern yields no usable step */
export const FALLBACK_STEPS: readonly number[] = [1, 7, 14, 30];

const STEP_PATTERN = /^(\d+)\s*([dwmy])$/;

// =============================================================================
// Parsing
// =============================================================================

function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESET_SCHEDULES, value);
}

function isPatternUnit(value: string): value is PatternUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_DAYS, value);
}

/**
 * Expand a preset name to its pattern; other values are returned as given.
 */
export function resolvePattern(pattern: string): string {
  const key = pattern.trim().toLowerCase();
  return isPresetName(key) ? PRESET_SCHEDULES[key] : pattern;
}

function parseSteps(pattern: string): number[] {
  const steps: number[] = [];

  for (const part of resolvePattern(pattern).split(",")) {
    const match = part.trim().toLowerCase().match(STEP_PATTERN);
    if (!match) {
      continue;
    }
    const [, value, unit] = match;
    const amount = Number(value);
    if (amount > 0 && isPatternUnit(unit)) {
      steps.push(amount * UNIT_DAYS[unit]);
    }
  }

  return steps;
}

/**
 * Parse a pattern into its non-empty list of steps in days.
 * Unrecognised steps are skipped; a pattern with no valid step yields
 * FALLBACK_STEPS.
 *
 * @example parseSchedulePattern("1d,1w,2w") // [1, 7, 14]
 * @example parseSchedulePattern("relaxed") // [7, 14, 30, 60, 180, 365]
 */
export function parseSchedulePattern(pattern: string): number[] {
  const steps = parseSteps(pattern);
  return steps.length > 0 ? steps : [...FALLBACK_STEPS];
}

/**
 * Whether a pattern contains at least one valid step (or names a preset).
 */
export function isValidSchedulePattern(pattern: string): boolean {
  return parseSteps(pattern).length > 0;
}
