/**
 * Tagged console logging. Debug output is off unless DEBUG_PIPELINE=true.
 */

export const DEBUG_PIPELINE = process.env.DEBUG_PIPELINE === "true";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(...args) {
      if (DEBUG_PIPELINE) console.log(prefix, ...args);
    },
    info(...args) {
      console.log(prefix, ...args);
    },
    warn(...args) {
      console.warn(prefix, ...args);
    },
    error(...args) {
      console.error(prefix, ...args);
    },
  };
}
