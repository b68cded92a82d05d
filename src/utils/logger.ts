/**
 * Logging System
 *
 * Console logging for every toolkit script, with an optional log file.
 * Errors go to stderr so scripts can be piped; everything else goes to stdout.
 */

import fs from 'fs/promises';
import path from 'path';

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for the log file. No file is written when omitted. */
  logDir?: string;
  /** Name written into the log file header and file name */
  scriptName?: string;
  verbose?: boolean;
}

export class Logger {
  private logFilePath?: string;
  private logBuffer: LogEntry[] = [];
  private consoleEnabled: boolean = true;
  private verbose: boolean;
  private scriptName: string;
  private pendingWrites: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? process.env.LOG_LEVEL === 'debug';
    this.scriptName = options.scriptName ?? 'az-toolkit';

    if (options.logDir) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5);
      this.logFilePath = path.join(options.logDir, `${this.scriptName}-${timestamp}.log`);
    }
  }

  /**
   * Create the log directory and write the file header
   */
  async initialize(): Promise<void> {
    if (!this.logFilePath) {
      return;
    }

    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });

    const header = [
      '='.repeat(80),
      `${this.scriptName} log`,
      `Started: ${new Date().toISOString()}`,
      '='.repeat(80),
      '',
    ].join('\n');

    await fs.writeFile(this.logFilePath, header, 'utf-8');
    this.debug(`Logging to: ${this.logFilePath}`);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  success(message: string, context?: Record<string, unknown>): void {
    this.log('success', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Print a line of command output as-is (tables, JSON).
   * Not prefixed and not filtered by level.
   */
  output(text: string): void {
    console.log(text);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    this.logBuffer.push(entry);

    const visible = level === 'error' || (this.consoleEnabled && (level !== 'debug' || this.verbose));
    if (visible) {
      const line = `${this.getPrefix(level)} ${message}`;
      const write = level === 'error' ? console.error : console.log;
      write(line);

      if (context) {
        write('  Context:', JSON.stringify(context, null, 2));
      }
    }

    if (this.logFilePath) {
      const filePath = this.logFilePath;
      this.pendingWrites = this.pendingWrites
        .then(() => fs.appendFile(filePath, this.formatLogEntry(entry) + '\n', 'utf-8'))
        .catch(err => {
          console.error('Failed to write to log file:', err instanceof Error ? err.message : err);
        });
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'info':
        return 'ℹ️ ';
      case 'warn':
        return '⚠️ ';
      case 'error':
        return '❌';
      case 'success':
        return '✅';
      case 'debug':
        return '🔍';
    }
  }

  private formatLogEntry(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(7);
    let line = `[${entry.timestamp}] [${level}] ${entry.message}`;

    if (entry.context) {
      line += '\n' + JSON.stringify(entry.context, null, 2);
    }

    return line;
  }

  /**
   * Turn status lines on or off. Errors and output() lines always print.
   */
  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  getLogFilePath(): string | undefined {
    return this.logFilePath;
  }

  getLogBuffer(): LogEntry[] {
    return [...this.logBuffer];
  }

  /**
   * Flush pending writes and append the run summary
   */
  async close(): Promise<void> {
    await this.pendingWrites;

    if (!this.logFilePath) {
      return;
    }

    const errorCount = this.logBuffer.filter(e => e.level === 'error').length;
    const warnCount = this.logBuffer.filter(e => e.level === 'warn').length;

    const summaryText = [
      '',
      '='.repeat(80),
      `Errors:    ${errorCount}`,
      `Warnings:  ${warnCount}`,
      `Completed: ${new Date().toISOString()}`,
      '='.repeat(80),
      '',
    ].join('\n');

    await fs.appendFile(this.logFilePath, summaryText, 'utf-8');
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * Initialize global logger
 */
export async function initializeLogger(options: LoggerOptions = {}): Promise<Logger> {
  globalLogger = new Logger({
    ...options,
    logDir: options.logDir ?? (process.env.LOG_DIR || undefined),
  });
  await globalLogger.initialize();
  return globalLogger;
}
