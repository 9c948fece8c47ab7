export interface ConfigurationSettings {
  xMax: number;
  yMax: number;
  touchThreshold: number;
  touchPoints: number;
  filterCoefficient: number;
}

export type SettingName = keyof ConfigurationSettings;

export const SETTING_NAMES: readonly SettingName[] = [
  'xMax',
  'yMax',
  'touchThreshold',
  'touchPoints',
  'filterCoefficient'
];
