import { ValidationError } from './errors.ts';
import { SETTING_NAMES, type ConfigurationSettings, type SettingName } from './settings.ts';

export const RESOLUTION_MAX = 4095;

export const RESOLUTION_ERROR = 'resolution out of range or odd';
export const INTEGER_ERROR = 'setting must be an integer';

export interface InputRange {
  min: number;
  max: number;
}

/** Ranges the interactive configurator accepts; the encoder itself does not enforce them. */
export const INPUT_RANGES: Readonly<Record<SettingName, InputRange>> = Object.freeze({
  xMax: { min: 2, max: 4094 },
  yMax: { min: 2, max: 4094 },
  touchThreshold: { min: 1, max: 255 },
  touchPoints: { min: 1, max: 10 },
  filterCoefficient: { min: 0, max: 15 }
});

export interface RangeIssue {
  field: SettingName;
  value: number;
  min: number;
  max: number;
  message: string;
}

export function isValidResolution(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= RESOLUTION_MAX && value % 2 === 0;
}

/**
 * Throws ValidationError for settings the encoder must not see.
 * Threshold, touch points and filter are only required to be integers:
 * the encoder clamps, floors or masks them.
 */
export function validateSettings(settings: ConfigurationSettings): void {
  for (const field of ['xMax', 'yMax'] as const) {
    const value = settings[field];
    if (!isValidResolution(value)) {
      throw new ValidationError(RESOLUTION_ERROR, field, value);
    }
  }
  for (const field of ['touchThreshold', 'touchPoints', 'filterCoefficient'] as const) {
    const value = settings[field];
    if (!Number.isInteger(value)) {
      throw new ValidationError(INTEGER_ERROR, field, value);
    }
  }
}

export function findRangeIssues(settings: ConfigurationSettings): RangeIssue[] {
  const issues: RangeIssue[] = [];
  for (const field of SETTING_NAMES) {
    const range = INPUT_RANGES[field];
    const value = settings[field];
    if (Number.isInteger(value) && value >= range.min && value <= range.max) continue;
    issues.push({
      field,
      value,
      min: range.min,
      max: range.max,
      message: `${field} out of range (${value}, expected ${range.min}-${range.max})`
    });
  }
  return issues;
}
