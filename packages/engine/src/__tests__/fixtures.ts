import type { ConfigurationSettings } from '../settings.ts';

export function sevenInchSettings(overrides: Partial<ConfigurationSettings> = {}): ConfigurationSettings {
  return {
    xMax: 1024,
    yMax: 600,
    touchThreshold: 16,
    touchPoints: 5,
    filterCoefficient: 4,
    ...overrides
  };
}

export function sumBytes(bytes: Uint8Array, start: number, endInclusive: number): number {
  let sum = 0;
  for (let index = start; index <= endInclusive; index += 1) sum += bytes[index];
  return sum;
}
