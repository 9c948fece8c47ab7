import { computeChecksum } from './checksum.ts';
import { formatFieldValue, type ConfigurationView } from './decoder.ts';
import { BufferLengthError } from './errors.ts';
import {
  CHECKSUM_COVERED_LENGTH,
  CHECKSUM_OFFSET,
  CONFIG_FRESH_FLAG,
  CONFIG_LENGTH,
  FIELD_LAYOUT,
  FRESH_OFFSET,
  formatRegister
} from './layout.ts';

const LABEL_WIDTH = 32;
const TITLE = '=== GT911 Configuration Details ===';

function hexByte(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
}

export function formatConfigDetails(view: ConfigurationView): string[] {
  const lines = [TITLE];
  for (const entry of FIELD_LAYOUT) {
    const label = `${entry.label} (${formatRegister(entry)}):`;
    lines.push(` ${label.padEnd(LABEL_WIDTH)}${formatFieldValue(entry, view[entry.name])}`);
  }
  lines.push('='.repeat(TITLE.length));
  return lines;
}

export function describeChecksum(blob: Uint8Array): string {
  if (blob.length !== CONFIG_LENGTH) {
    throw new BufferLengthError(CONFIG_LENGTH, blob.length);
  }
  const stored = blob[CHECKSUM_OFFSET];
  const computed = computeChecksum(blob.subarray(0, CHECKSUM_COVERED_LENGTH));
  if (stored === computed) return `Checksum OK (${hexByte(stored)})`;
  return `Checksum MISMATCH (stored ${hexByte(stored)}, computed ${hexByte(computed)})`;
}

/** Invariants an image must hold before it is handed to the driver; empty when it is sound. */
export function findBlobProblems(blob: Uint8Array): string[] {
  if (blob.length !== CONFIG_LENGTH) {
    return [`expected ${CONFIG_LENGTH} bytes, got ${blob.length}`];
  }
  const problems: string[] = [];
  const computed = computeChecksum(blob.subarray(0, CHECKSUM_COVERED_LENGTH));
  if (blob[CHECKSUM_OFFSET] !== computed) {
    problems.push(`checksum mismatch (stored ${hexByte(blob[CHECKSUM_OFFSET])}, computed ${hexByte(computed)})`);
  }
  if (blob[FRESH_OFFSET] !== CONFIG_FRESH_FLAG) {
    problems.push(`config fresh flag is ${hexByte(blob[FRESH_OFFSET])}, expected ${hexByte(CONFIG_FRESH_FLAG)}`);
  }
  return problems;
}
