/** Output sink for anything that prints; `console` in production, a capture in tests. */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
