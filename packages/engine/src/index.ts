export { computeChecksum, verifyChecksum, byteSum } from './checksum.ts';
export { decodeConfig, decodeFields, formatFieldValue } from './decoder.ts';
export {
  encodeConfig,
  normalizeSettings,
  clampTouchPoints,
  floorTouchThreshold,
  maskFilterCoefficient,
  TOUCH_POINTS_MIN,
  TOUCH_POINTS_MAX,
  TOUCH_THRESHOLD_MIN
} from './encoder.ts';
export { BufferLengthError, ValidationError } from './errors.ts';
export { bytesToHex, formatHexDump, parseHexBytes } from './hex.ts';
export {
  BASE_REGISTER,
  CHECKSUM_COVERED_LENGTH,
  CHECKSUM_OFFSET,
  CONFIG_FRESH_FLAG,
  CONFIG_LENGTH,
  CONFIG_VERSION,
  FIELD_BY_NAME,
  FIELD_LAYOUT,
  FRESH_OFFSET,
  formatRegister,
  registerAddress
} from './layout.ts';
export {
  DEFAULT_PRESET,
  defaultPresetsPath,
  formatPresetList,
  loadPresets,
  parsePresetFile,
  resolvePreset
} from './presets.ts';
export { describeChecksum, findBlobProblems, formatConfigDetails } from './report.ts';
export { SETTING_NAMES } from './settings.ts';
export {
  findRangeIssues,
  INPUT_RANGES,
  INTEGER_ERROR,
  isValidResolution,
  RESOLUTION_ERROR,
  RESOLUTION_MAX,
  validateSettings
} from './validate.ts';
export type { ConfigurationView, DecodedField } from './decoder.ts';
export type { ByteOrder, FieldDisplay, FieldEncoding, FieldLayoutEntry, FieldName } from './layout.ts';
export type { Logger } from './logger.ts';
export type { PresetTable, ResolvedPreset } from './presets.ts';
export type { ConfigurationSettings, SettingName } from './settings.ts';
export type { InputRange, RangeIssue } from './validate.ts';
