import type { Logger } from './types/index.js';

/** Console-backed logger. Writes to stderr so stdio transports stay clean. */
export function createConsoleLogger(prefix = '[halyard]'): Logger {
  return {
    debug: (msg) => {
      if (process.env['HALYARD_DEBUG']) console.error(`${prefix} ${msg}`);
    },
    info: (msg) => console.error(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
  };
}

export const defaultLogger: Logger = createConsoleLogger();
