import { BufferLengthError } from './errors.ts';
import {
  CONFIG_LENGTH,
  FIELD_BY_NAME,
  FIELD_LAYOUT,
  formatRegister,
  registerAddress,
  type FieldLayoutEntry,
  type FieldName
} from './layout.ts';

export interface ConfigurationView {
  configVersion: number;
  xMax: number;
  yMax: number;
  touchPoints: number;
  moduleSwitch1: number;
  moduleSwitch2: number;
  shakeCount: number;
  filterCoefficient: number;
  touchThreshold: number;
  checksum: number;
  configFresh: number;
}

export interface DecodedField {
  name: FieldName;
  label: string;
  value: number;
  display: string;   // hex or decimal text per layout entry
  offset: number;
  size: number;
  register: number;
  registerText: string;
}

function assertConfigLength(blob: Uint8Array): DataView {
  if (blob.length !== CONFIG_LENGTH) {
    throw new BufferLengthError(CONFIG_LENGTH, blob.length);
  }
  return new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
}

function readField(view: DataView, entry: FieldLayoutEntry): number {
  if (entry.width === 2) {
    return view.getUint16(entry.offset, entry.byteOrder === 'little-endian');
  }
  return view.getUint8(entry.offset);
}

export function formatFieldValue(entry: FieldLayoutEntry, value: number): string {
  if (entry.display === 'hex') {
    return `0x${value.toString(16).toUpperCase().padStart(entry.width * 2, '0')}`;
  }
  return String(value);
}

/** Reads every layout field. The stored checksum is returned as-is, not verified. */
export function decodeConfig(blob: Uint8Array): ConfigurationView {
  const view = assertConfigLength(blob);
  const read = (name: FieldName): number => readField(view, FIELD_BY_NAME[name]);

  return {
    configVersion: read('configVersion'),
    xMax: read('xMax'),
    yMax: read('yMax'),
    touchPoints: read('touchPoints'),
    moduleSwitch1: read('moduleSwitch1'),
    moduleSwitch2: read('moduleSwitch2'),
    shakeCount: read('shakeCount'),
    filterCoefficient: read('filterCoefficient'),
    touchThreshold: read('touchThreshold'),
    checksum: read('checksum'),
    configFresh: read('configFresh')
  };
}

export function decodeFields(blob: Uint8Array): DecodedField[] {
  const view = assertConfigLength(blob);
  return FIELD_LAYOUT.map(entry => {
    const value = readField(view, entry);
    return {
      name: entry.name,
      label: entry.label,
      value,
      display: formatFieldValue(entry, value),
      offset: entry.offset,
      size: entry.width,
      register: registerAddress(entry.offset),
      registerText: formatRegister(entry)
    };
  });
}
