export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...rest) => {
      if (options.verbose) console.log(`${tag} ${message}`, ...rest);
    },
    info: (message, ...rest) => console.log(`${tag} ${message}`, ...rest),
    warn: (message, ...rest) => console.warn(`${tag} ${message}`, ...rest),
    error: (message, ...rest) => console.error(`${tag} ${message}`, ...rest),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
