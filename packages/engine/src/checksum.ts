import { BufferLengthError } from './errors.ts';
import { CHECKSUM_COVERED_LENGTH, CHECKSUM_OFFSET, CONFIG_LENGTH } from './layout.ts';

export function byteSum(bytes: Uint8Array): number {
  let sum = 0;
  for (let index = 0; index < bytes.length; index += 1) {
    sum = (sum + bytes[index]) & 0xff;
  }
  return sum;
}

/**
 * Two's-complement of the byte sum over the 184 covered bytes, so that
 * bytes 0..184 of a finished image add up to 0 mod 256.
 */
export function computeChecksum(body: Uint8Array): number {
  if (body.length !== CHECKSUM_COVERED_LENGTH) {
    throw new BufferLengthError(CHECKSUM_COVERED_LENGTH, body.length);
  }
  return (~byteSum(body) + 1) & 0xff;
}

export function verifyChecksum(blob: Uint8Array): boolean {
  if (blob.length !== CONFIG_LENGTH) {
    throw new BufferLengthError(CONFIG_LENGTH, blob.length);
  }
  return computeChecksum(blob.subarray(0, CHECKSUM_COVERED_LENGTH)) === blob[CHECKSUM_OFFSET];
}
