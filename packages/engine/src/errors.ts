import type { FieldName } from './layout.ts';

/** Settings that cannot be encoded. Thrown before any buffer is built. */
export class ValidationError extends Error {
  readonly field: FieldName;
  readonly value: number;

  constructor(message: string, field: FieldName, value: number) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

/** A byte sequence handed to the codec with the wrong length. */
export class BufferLengthError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`expected ${expected} bytes, got ${actual}`);
    this.name = 'BufferLengthError';
    this.expected = expected;
    this.actual = actual;
  }
}
