export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

/**
 * Console-backed logger. Everything goes to stderr so that view output on
 * stdout stays clean when piped.
 */
export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  const logger: Logger = {
    info: (message) => console.error(message),
    warn: (message) => console.error(`warn: ${message}`),
    error: (message) => console.error(`error: ${message}`),
  };
  if (options.debug) {
    logger.debug = (message) => console.error(`debug: ${message}`);
  }
  return logger;
}
