import { registerAddress } from './layout.ts';

const DUMP_ROW_LENGTH = 16;

// Drops the register column that formatHexDump writes at the start of each row.
const DUMP_ADDRESS = /^[ \t]*0x[0-9A-Fa-f]{4}(?=\s)/gm;

function normalizeHex(input: string): string {
  return input
    .replace(DUMP_ADDRESS, '')
    .replace(/0x/gi, '')
    .replace(/[^0-9A-Fa-f]/g, ' ')
    .trim()
    .replace(/\s+/g, ' ')
    .toUpperCase();
}

export function parseHexBytes(input: string): Uint8Array {
  const normalized = normalizeHex(input);
  if (!normalized) return new Uint8Array(0);
  const tokens = normalized.split(' ');
  const bytes = new Uint8Array(tokens.length);
  tokens.forEach((token, index) => {
    if (token.length !== 2) {
      throw new Error(`Invalid hex token "${token}"`);
    }
    bytes[index] = Number.parseInt(token, 16);
  });
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, byte => byte.toString(16).padStart(2, '0').toUpperCase()).join(' ');
}

/** Rows of 16 bytes, each prefixed with the register address of its first byte. */
export function formatHexDump(blob: Uint8Array): string[] {
  const lines: string[] = [];
  for (let offset = 0; offset < blob.length; offset += DUMP_ROW_LENGTH) {
    const address = registerAddress(offset).toString(16).toUpperCase().padStart(4, '0');
    lines.push(`0x${address}  ${bytesToHex(blob.subarray(offset, offset + DUMP_ROW_LENGTH))}`);
  }
  return lines;
}
