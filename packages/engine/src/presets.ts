import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from './logger.ts';
import { SETTING_NAMES, type ConfigurationSettings } from './settings.ts';

export const DEFAULT_PRESET = '7inch';

export type PresetTable = ReadonlyMap<string, Readonly<ConfigurationSettings>>;

export interface ResolvedPreset {
  name: string;
  settings: ConfigurationSettings;
  fallback: boolean;
}

export function defaultPresetsPath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(moduleDir, '..', 'profiles', 'presets.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSettings(raw: Record<string, unknown>): ConfigurationSettings | null {
  const values: Partial<ConfigurationSettings> = {};
  for (const field of SETTING_NAMES) {
    const value = raw[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) return null;
    values[field] = value;
  }
  const { xMax, yMax, touchThreshold, touchPoints, filterCoefficient } = values;
  if (
    xMax === undefined ||
    yMax === undefined ||
    touchThreshold === undefined ||
    touchPoints === undefined ||
    filterCoefficient === undefined
  ) {
    return null;
  }
  return { xMax, yMax, touchThreshold, touchPoints, filterCoefficient };
}

/**
 * Builds a preset table from a parsed `{ "presets": { name: settings } }` payload.
 * Malformed entries are skipped with a warning.
 */
export function parsePresetFile(payload: unknown, logger: Logger = console): Map<string, Readonly<ConfigurationSettings>> {
  const table = new Map<string, Readonly<ConfigurationSettings>>();
  if (!isRecord(payload) || !isRecord(payload.presets)) {
    throw new Error('Preset file must contain a "presets" object');
  }
  for (const [rawName, rawSettings] of Object.entries(payload.presets)) {
    const name = rawName.trim().toLowerCase();
    if (!name) continue;
    const settings = isRecord(rawSettings) ? readSettings(rawSettings) : null;
    if (!settings) {
      logger.warn(`WARNING: Skipping preset "${rawName}": expected numeric ${SETTING_NAMES.join(', ')}`);
      continue;
    }
    table.set(name, Object.freeze(settings));
  }
  return table;
}

export function loadPresets(filePath: string = defaultPresetsPath(), logger: Logger = console): PresetTable {
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new Error(`Failed to load presets from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  try {
    return parsePresetFile(payload, logger);
  } catch (error) {
    throw new Error(`Failed to load presets from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Case-insensitive lookup; an unknown name falls back to the 7-inch preset. */
export function resolvePreset(table: PresetTable, name: string): ResolvedPreset {
  const key = name.trim().toLowerCase();
  const found = table.get(key);
  if (found) {
    return { name: key, settings: { ...found }, fallback: false };
  }
  const fallback = table.get(DEFAULT_PRESET);
  if (!fallback) {
    throw new Error(`Unknown preset "${name}" and no "${DEFAULT_PRESET}" preset to fall back to`);
  }
  return { name: DEFAULT_PRESET, settings: { ...fallback }, fallback: true };
}

export function formatPresetList(table: PresetTable): string[] {
  const lines = ['Available Presets:'];
  for (const [name, settings] of table) {
    lines.push('');
    lines.push(`${name}:`);
    lines.push(`  Resolution:         ${settings.xMax}x${settings.yMax}`);
    lines.push(`  Touch Threshold:    ${settings.touchThreshold}`);
    lines.push(`  Number of Touches:  ${settings.touchPoints}`);
    lines.push(`  Filter Coefficient: ${settings.filterCoefficient}`);
  }
  return lines;
}
