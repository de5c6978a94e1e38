/**
 * Leveled logger with terminal formatting.
 * Writes to stderr: stdout belongs to the operator prompts and results.
 */
import { colors, formatCategory, formatLogLevel } from './terminal-ui';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = keyof typeof LogLevel;

export type LogData = Record<string, unknown>;

export function isLogLevelName(value: string): value is LogLevelName {
  return value === 'DEBUG' || value === 'INFO' || value === 'WARN' || value === 'ERROR';
}

export class Logger {
  private level: LogLevel = LogLevel.WARN;
  private sink: (line: string) => void = (line) => console.error(line);

  setLevel(level: LogLevelName): void {
    this.level = LogLevel[level];
  }

  setSink(sink: (line: string) => void): void {
    this.sink = sink;
  }

  private log(level: LogLevel, category: string, message: string, data?: LogData): void {
    if (level < this.level) return;
    const ts = new Date().toISOString();
    const timestamp = `${colors.gray}${ts}${colors.reset}`;
    const levelStr = formatLogLevel(LogLevel[level]);
    const categoryStr = formatCategory(category);
    const messageStr = `${colors.bright}${message}${colors.reset}`;
    const dataStr = data ? ` ${colors.dim}${JSON.stringify(data)}${colors.reset}` : '';

    this.sink(`${timestamp} ${levelStr} ${categoryStr} ${messageStr}${dataStr}`);
  }

  debug(category: string, message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: string, message: string, data?: LogData): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: string, message: string, data?: LogData): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: string, message: string, data?: LogData): void {
    this.log(LogLevel.ERROR, category, message, data);
  }

  // Specialized loggers
  git(event: string, args: string[], data?: LogData): void {
    this.debug('Git', `${event} - git ${args.join(' ')}`, data);
  }

  llm(event: string, provider: string, data?: LogData): void {
    this.info('LLM', `${event} - Provider: ${provider}`, data);
  }
}

export const logger = new Logger();
