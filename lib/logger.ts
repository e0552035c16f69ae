/**
 * Tagged console logging, e.g. `📚 [Discoverer] Fetching page 2...`
 */

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Drop info lines; warnings and errors still print */
  quiet?: boolean;
  /** Defaults to the global console */
  sink?: LogSink;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const prefix = `[${tag}]`;

  return {
    info: options.quiet ? () => {} : (message: string) => sink.log(`${prefix} ${message}`),
    warn: (message: string) => sink.warn(`⚠️ ${prefix} ${message}`),
    error: (message: string) => sink.error(`❌ ${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
