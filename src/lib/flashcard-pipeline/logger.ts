import type { Logger } from './types';

/**
 * Console-backed logger. Debug lines only print when verbose.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug: (message, ...details) => {
      if (verbose) console.log(message, ...details);
    },
    info: (message, ...details) => console.log(message, ...details),
    warn: (message, ...details) => console.warn(message, ...details),
    error: (message, ...details) => console.error(message, ...details),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Short single-line excerpt for log context
 */
export function excerpt(text: string, length = 60): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}
