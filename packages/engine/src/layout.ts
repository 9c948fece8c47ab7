/** Total image size: registers 0x8047..0x8100 inclusive. */
export const CONFIG_LENGTH = 186;
/** Bytes 0..183 are covered by the checksum. */
export const CHECKSUM_COVERED_LENGTH = 184;
export const CHECKSUM_OFFSET = 184;
export const FRESH_OFFSET = 185;
export const BASE_REGISTER = 0x8047;

export const CONFIG_VERSION = 0x01;
export const CONFIG_FRESH_FLAG = 0x01;
export const MODULE_SWITCH_DEFAULT = 0x00;
export const SHAKE_COUNT_DEFAULT = 0x03;

export type FieldName =
  | 'configVersion'
  | 'xMax'
  | 'yMax'
  | 'touchPoints'
  | 'moduleSwitch1'
  | 'moduleSwitch2'
  | 'shakeCount'
  | 'filterCoefficient'
  | 'touchThreshold'
  | 'checksum'
  | 'configFresh';

export type ByteOrder = 'none' | 'little-endian';

// How the encoder fills the field; 'fixed' fields always carry fixedValue.
export type FieldEncoding = 'fixed' | 'u16le' | 'u8-clamped' | 'u8-masked' | 'u8-floored' | 'checksum';

export type FieldDisplay = 'hex' | 'decimal';

export interface FieldLayoutEntry {
  readonly name: FieldName;
  readonly label: string;
  readonly offset: number;
  readonly width: 1 | 2;
  readonly byteOrder: ByteOrder;
  readonly encoding: FieldEncoding;
  readonly display: FieldDisplay;
  readonly fixedValue?: number;
}

function defineField(entry: FieldLayoutEntry): FieldLayoutEntry {
  return Object.freeze({ ...entry });
}

export const FIELD_BY_NAME: Readonly<Record<FieldName, FieldLayoutEntry>> = Object.freeze({
  configVersion: defineField({
    name: 'configVersion',
    label: 'Config_Version',
    offset: 0,
    width: 1,
    byteOrder: 'none',
    encoding: 'fixed',
    display: 'hex',
    fixedValue: CONFIG_VERSION
  }),
  xMax: defineField({
    name: 'xMax',
    label: 'X_Resolution',
    offset: 1,
    width: 2,
    byteOrder: 'little-endian',
    encoding: 'u16le',
    display: 'decimal'
  }),
  yMax: defineField({
    name: 'yMax',
    label: 'Y_Resolution',
    offset: 3,
    width: 2,
    byteOrder: 'little-endian',
    encoding: 'u16le',
    display: 'decimal'
  }),
  touchPoints: defineField({
    name: 'touchPoints',
    label: 'Touch_Number',
    offset: 5,
    width: 1,
    byteOrder: 'none',
    encoding: 'u8-clamped',
    display: 'decimal'
  }),
  // bit 7 = Y2Y, bit 6 = X2X; zero means no axis swap or invert
  moduleSwitch1: defineField({
    name: 'moduleSwitch1',
    label: 'Module_Switch1',
    offset: 6,
    width: 1,
    byteOrder: 'none',
    encoding: 'fixed',
    display: 'hex',
    fixedValue: MODULE_SWITCH_DEFAULT
  }),
  moduleSwitch2: defineField({
    name: 'moduleSwitch2',
    label: 'Module_Switch2',
    offset: 7,
    width: 1,
    byteOrder: 'none',
    encoding: 'fixed',
    display: 'hex',
    fixedValue: MODULE_SWITCH_DEFAULT
  }),
  shakeCount: defineField({
    name: 'shakeCount',
    label: 'Shake_Count',
    offset: 8,
    width: 1,
    byteOrder: 'none',
    encoding: 'fixed',
    display: 'decimal',
    fixedValue: SHAKE_COUNT_DEFAULT
  }),
  filterCoefficient: defineField({
    name: 'filterCoefficient',
    label: 'Filter',
    offset: 9,
    width: 1,
    byteOrder: 'none',
    encoding: 'u8-masked',
    display: 'decimal'
  }),
  touchThreshold: defineField({
    name: 'touchThreshold',
    label: 'Screen_Touch_Level',
    offset: 12,
    width: 1,
    byteOrder: 'none',
    encoding: 'u8-floored',
    display: 'decimal'
  }),
  checksum: defineField({
    name: 'checksum',
    label: 'Config_Chksum',
    offset: CHECKSUM_OFFSET,
    width: 1,
    byteOrder: 'none',
    encoding: 'checksum',
    display: 'hex'
  }),
  configFresh: defineField({
    name: 'configFresh',
    label: 'Config_Fresh',
    offset: FRESH_OFFSET,
    width: 1,
    byteOrder: 'none',
    encoding: 'fixed',
    display: 'hex',
    fixedValue: CONFIG_FRESH_FLAG
  })
});

/** Layout entries in ascending offset order. */
export const FIELD_LAYOUT: readonly FieldLayoutEntry[] = Object.freeze(
  Object.values(FIELD_BY_NAME).sort((a, b) => a.offset - b.offset)
);

export function registerAddress(offset: number): number {
  return BASE_REGISTER + offset;
}

function hex4(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Register text for a field, e.g. `0x8047` or `0x8048..49` for a two-byte field.
 */
export function formatRegister(entry: FieldLayoutEntry): string {
  const first = registerAddress(entry.offset);
  if (entry.width === 1) return `0x${hex4(first)}`;
  const last = registerAddress(entry.offset + entry.width - 1);
  return `0x${hex4(first)}..${hex4(last).slice(2)}`;
}
