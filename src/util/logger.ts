export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
}

const TAG = "[gapflight]";

export function createConsoleLogger(tag = TAG): Logger {
  return {
    debug: (message, ...details) => console.debug(`${tag} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${tag} ${message}`, ...details)
  };
}

export const defaultLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined
};
