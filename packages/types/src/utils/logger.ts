/* eslint-disable no-console */

/**
 * Diagnostic channel shared by the pipeline stages.
 *
 * Fallbacks (lossy decoding, inserted headers, unknown bank codes) are reported here
 * as warnings so that operators can spot a bank format that needs a new rule.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface ConsoleLoggerOptions {
  /** Emit [DEBUG] and [INFO] lines (default: false) */
  verbose?: boolean;
  /** Sink for formatted lines (default: console.error, i.e. stderr) */
  write?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    debug(message) {
      if (verbose) write(`[DEBUG] ${message}`);
    },
    info(message) {
      if (verbose) write(`[INFO] ${message}`);
    },
    warn(message) {
      write(`[WARN] ${message}`);
    },
    error(message, error) {
      write(`[ERROR] ${message}`);
      if (error instanceof Error && error.stack !== undefined) {
        write(error.stack);
      } else if (error !== undefined) {
        write(String(error));
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
