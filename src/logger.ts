import type { Logger } from './types.js';

/**
 * Console-backed logger with a `[name]` prefix. Debug output only when DEBUG=true.
 */
export function createLogger(name: string): Logger {
  const prefix = `[${name}]`;
  return {
    debug: (message) => {
      if (process.env.DEBUG === 'true') {
        console.debug(`${prefix} ${message}`);
      }
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

/** Logger that discards everything (tests, embedded use) */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
