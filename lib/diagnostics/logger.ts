// lib/diagnostics/logger.ts

/** Console-shaped sink. Defaults to the global console; tests pass a recording stub. */
export type SimLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const consoleLogger: SimLogger = console;

export const silentLogger: SimLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
