import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

export interface FileLoggerOptions {
  logFile: string;
  /** Echo each line to the console as well as the log file */
  verbose?: boolean;
  now?: () => Date;
  echo?: (line: string) => void;
}

export function formatLogLine(level: LogLevel, message: string, now: Date): string {
  return `[${now.toISOString()}] [${level}] ${message}`;
}

/**
 * Append-only log file, one line per message. Writes are synchronous so lines
 * land in the order the loop produced them, even if the process is killed.
 */
export function createFileLogger(options: FileLoggerOptions): Logger {
  const now = options.now ?? (() => new Date());
  const echo = options.echo ?? ((line: string) => console.log(line));
  mkdirSync(dirname(options.logFile), { recursive: true });

  const write = (level: LogLevel, message: string) => {
    const line = formatLogLine(level, message, now());
    appendFileSync(options.logFile, `${line}\n`, 'utf-8');
    if (options.verbose) {
      echo(`[${level}] ${message}`);
    }
  };

  return {
    debug: (message) => {
      if (options.verbose) write('DEBUG', message);
    },
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    error: (message) => write('ERROR', message),
    success: (message) => write('SUCCESS', message),
  };
}
