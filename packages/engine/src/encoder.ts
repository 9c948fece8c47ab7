import { computeChecksum } from './checksum.ts';
import {
  CHECKSUM_COVERED_LENGTH,
  CONFIG_LENGTH,
  FIELD_LAYOUT,
  type FieldLayoutEntry
} from './layout.ts';
import type { ConfigurationSettings } from './settings.ts';
import { validateSettings } from './validate.ts';

export const TOUCH_POINTS_MIN = 1;
export const TOUCH_POINTS_MAX = 10;
export const TOUCH_THRESHOLD_MIN = 1;

export function clampTouchPoints(value: number): number {
  return Math.min(Math.max(TOUCH_POINTS_MIN, value), TOUCH_POINTS_MAX);
}

// No ceiling: 256 and above wrap to the low byte.
export function floorTouchThreshold(value: number): number {
  return Math.max(TOUCH_THRESHOLD_MIN, value) & 0xff;
}

export function maskFilterCoefficient(value: number): number {
  return value & 0xff;
}

/**
 * The settings as the encoder stores them: touch points clamped to 1..10,
 * filter masked to a byte, threshold floored at 1 and truncated to a byte.
 */
export function normalizeSettings(settings: ConfigurationSettings): ConfigurationSettings {
  return {
    xMax: settings.xMax,
    yMax: settings.yMax,
    touchThreshold: floorTouchThreshold(settings.touchThreshold),
    touchPoints: clampTouchPoints(settings.touchPoints),
    filterCoefficient: maskFilterCoefficient(settings.filterCoefficient)
  };
}

function fieldValue(entry: FieldLayoutEntry, stored: ConfigurationSettings): number | null {
  switch (entry.encoding) {
    case 'fixed':
      return entry.fixedValue ?? 0;
    case 'checksum':
      return null;
    case 'u16le':
    case 'u8-clamped':
    case 'u8-masked':
    case 'u8-floored':
      switch (entry.name) {
        case 'xMax':
          return stored.xMax;
        case 'yMax':
          return stored.yMax;
        case 'touchPoints':
          return stored.touchPoints;
        case 'filterCoefficient':
          return stored.filterCoefficient;
        case 'touchThreshold':
          return stored.touchThreshold;
        default:
          throw new Error(`No settings value for layout field ${entry.name}`);
      }
  }
}

function writeField(view: DataView, entry: FieldLayoutEntry, value: number): void {
  if (entry.width === 2) {
    view.setUint16(entry.offset, value, entry.byteOrder === 'little-endian');
    return;
  }
  view.setUint8(entry.offset, value);
}

/**
 * Builds the 186-byte register image for the given settings.
 * Throws ValidationError before anything is allocated.
 */
export function encodeConfig(settings: ConfigurationSettings): Uint8Array {
  validateSettings(settings);
  const stored = normalizeSettings(settings);

  const blob = new Uint8Array(CONFIG_LENGTH);
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);

  let checksumField: FieldLayoutEntry | null = null;
  for (const entry of FIELD_LAYOUT) {
    const value = fieldValue(entry, stored);
    if (value === null) {
      checksumField = entry;
      continue;
    }
    writeField(view, entry, value);
  }

  if (checksumField) {
    writeField(view, checksumField, computeChecksum(blob.subarray(0, CHECKSUM_COVERED_LENGTH)));
  }
  return blob;
}
