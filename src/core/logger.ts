import { Logger, LogLevel } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logFilePath: string;
  enableConsole: boolean;
  component?: string;
}

const LEVEL_ORDER: LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

function shouldLog(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(threshold);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLogLine(entry: LogEntry): string {
  const component = entry.component ? `[${entry.component}] ` : '';
  const metaStr = entry.meta ? ` ${JSON.stringify(entry.meta)}` : '';
  return `${entry.timestamp} - ${entry.level} - ${component}${entry.message}${metaStr}`;
}

/**
 * Logger that appends one text line per entry to a single log file for the
 * lifetime of the process, optionally mirroring entries to the console.
 */
export class FileLogger implements Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableFileLogging: true,
      logFilePath: 'file_organizer.log',
      enableConsole: false,
      ...config,
    };

    if (this.config.enableFileLogging) {
      this.initializeFileLogging();
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: formatLogTimestamp(new Date()),
      level,
      message,
      meta,
      component: this.config.component,
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.config.enableFileLogging) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const line = formatLogLine(entry);

    switch (entry.level) {
      case 'ERROR':
        console.error(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      case 'INFO':
        console.info(line);
        break;
      case 'DEBUG':
        console.debug(line);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    try {
      fs.appendFileSync(this.config.logFilePath, formatLogLine(entry) + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private initializeFileLogging(): void {
    try {
      const directory = path.dirname(this.config.logFilePath);
      if (!fs.existsSync(directory)) {
        fs.mkdirSync(directory, { recursive: true });
      }
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      this.config.enableFileLogging = false;
    }
  }

  public getLogFilePath(): string | undefined {
    return this.config.enableFileLogging ? this.config.logFilePath : undefined;
  }

  public createChildLogger(component: string): FileLogger {
    return new FileLogger({
      ...this.config,
      component,
    });
  }
}
