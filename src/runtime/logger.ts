export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only emitted in verbose mode. */
  debug(message: string): void;
};

export type ConsoleLoggerOptions = {
  verbose?: boolean;
  /** Drop `info` lines, e.g. when stdout carries JSON. */
  quiet?: boolean;
};

const noop = () => {};

export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => ({
  info: options.quiet ? noop : (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
  debug: options.verbose ? (message) => console.error(message) : noop,
});

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
