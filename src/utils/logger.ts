/**
 * Leveled logger for the update check.
 *
 * Everything goes to the diagnostic stream (stderr by default) so the update
 * report on stdout stays machine-readable.
 *
 * @example
 * ```typescript
 * const log = createLogger({ verbose: true });
 * log.info('Updating packages...');
 * log.warn('Path /x/default.nix: no value found for pname');
 * ```
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Show debug messages (default: false) */
  verbose?: boolean;
  /** Colorize level labels (default: whatever chalk detected for the terminal) */
  color?: boolean;
  /** Sink for formatted lines (default: process.stderr) */
  output?: (line: string) => void;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function formatData(data: unknown): string {
  if (data instanceof Error) return data.message;
  if (typeof data === 'object' && data !== null) return JSON.stringify(data);
  return String(data);
}

function formatMessage(level: LogLevel, message: string, data: unknown, color: boolean): string {
  const label = `[${level}]`;
  const parts = [color ? LEVEL_STYLES[level](label) : label, message];
  if (data !== undefined) {
    parts.push(`- ${formatData(data)}`);
  }
  return parts.join(' ');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    verbose = false,
    color = chalk.level > 0,
    output = (line: string) => {
      process.stderr.write(`${line}\n`);
    },
  } = options;

  const emit = (level: LogLevel, message: string, data?: unknown): void => {
    if (level === 'debug' && !verbose) return;
    output(formatMessage(level, message, data, color));
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

/**
 * Logger that records uncolored lines in memory, for tests.
 */
export function createTestLogger(
  options: Omit<LoggerOptions, 'output' | 'color'> = {},
): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    ...options,
    color: false,
    output: (line) => lines.push(line),
  });
  return { logger, lines };
}
