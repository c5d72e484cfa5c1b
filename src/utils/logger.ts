/**
 * Console logging with the tool's status markers.
 * Passed explicitly through options; nothing here is process-wide.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines. */
  readonly verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose: boolean = options.verbose ?? false;
  return {
    debug: (message: string): void => {
      if (verbose) {
        console.log(message);
      }
    },
    info: (message: string): void => console.log(message),
    warn: (message: string): void => console.warn(`⚠️  ${message}`),
    error: (message: string): void => console.error(`❌ ${message}`)
  };
}

export const silentLogger: Logger = {
  debug: (): void => undefined,
  info: (): void => undefined,
  warn: (): void => undefined,
  error: (): void => undefined
};
