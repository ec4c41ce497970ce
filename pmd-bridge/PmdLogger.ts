/**
 * PMD Logger
 * Leveled console logging, mirrored to a file when a log directory is configured
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface PmdLoggerOptions {
  level?: LogLevel;
  logDir?: string | null;
}

export class PmdLogger {
  private level: LogLevel;
  private logFilePath: string = '';
  private logStream: fs.WriteStream | null = null;

  constructor(options: PmdLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    if (options.logDir) {
      this.attachFile(options.logDir);
    }
  }

  // Mirror subsequent lines into a new file under logDir
  attachFile(logDir: string): void {
    this.close();
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(logDir, `pmd-session-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.info(`Log file: ${this.logFilePath}`);
    } catch (error) {
      // Continue with console only
      console.warn('PMD Logger: File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
    }
  }

  private formatMessage(level: string, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data, (_key, value: unknown) =>
          typeof value === 'bigint' ? value.toString() : value
        )}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown, category: string = 'PMD'): void {
    if (!this.isEnabled(level)) return;

    const formattedMessage = this.formatMessage(level.toUpperCase(), category, message, data);

    if (level === 'error') {
      console.error(formattedMessage);
    } else if (level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  debug(message: string, data?: unknown, category: string = 'PMD'): void {
    this.log('debug', message, data, category);
  }

  info(message: string, data?: unknown, category: string = 'PMD'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'PMD'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'PMD'): void {
    this.log('error', message, data, category);
  }

  // Error objects do not survive JSON.stringify
  logFailure(message: string, error: unknown, category: string = 'PMD'): void {
    this.error(message, {
      error: error instanceof Error ? error.message : String(error),
      name: error instanceof Error ? error.name : undefined,
    }, category);
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Shared instance, configured from the environment by PmdConfig
export const pmdLogger = new PmdLogger();
