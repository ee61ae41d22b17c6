import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

/**
 * Logger that writes to the console and, when configured, to a log file.
 * Debug output only reaches the console in debug mode.
 */
export class Logger {
  private static instance: Logger | null = null;
  private logPath: string | null = null;
  private debugMode = false;
  private buffer: LogEntry[] = [];
  private configured = false;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  configure(options: { logPath?: string; debug?: boolean }): void {
    if (this.configured && this.logPath === (options.logPath || null)) {
      this.debugMode = options.debug || false;
      return;
    }

    this.logPath = options.logPath || null;
    this.debugMode = options.debug || false;
    this.configured = true;

    if (this.logPath) {
      const dir = path.dirname(this.logPath);
      if (dir !== '.' && dir !== '/') {
        fs.ensureDirSync(dir);
      }
      this.writeToFile(`\n${'='.repeat(80)}`);
      this.writeToFile(`worker-manifest session started: ${new Date().toISOString()}`);
      this.writeToFile(`Debug mode: ${this.debugMode}`);
      this.writeToFile(`${'='.repeat(80)}\n`);
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    let formatted = `[${timestamp}] [${levelStr}] ${message}`;
    if (data !== undefined) {
      if (typeof data === 'object') {
        formatted += '\n' + JSON.stringify(data, null, 2);
      } else {
        formatted += ` ${String(data)}`;
      }
    }
    return formatted;
  }

  private writeToFile(content: string): void {
    if (this.logPath) {
      try {
        fs.appendFileSync(this.logPath, content + '\n');
      } catch (error) {
        // Reported on stderr only
        console.error(chalk.red(`[Logger] Failed to write to ${this.logPath}: ${String(error)}`));
      }
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const formatted = this.formatMessage(level, message, data);
    this.buffer.push({
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    });

    this.writeToFile(formatted);

    switch (level) {
      case 'debug':
        if (this.debugMode) {
          console.log(chalk.gray(formatted));
        }
        break;
      case 'info':
        console.log(chalk.blue(`[INFO] ${message}`));
        break;
      case 'warn':
        console.log(chalk.yellow(`[WARN] ${message}`));
        break;
      case 'error':
        console.log(chalk.red(`[ERROR] ${message}`));
        break;
    }
  }

  /**
   * Only shown in debug mode, always written to file
   */
  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  getLogPath(): string | null {
    return this.logPath;
  }

  getBuffer(): LogEntry[] {
    return [...this.buffer];
  }

  clearBuffer(): void {
    this.buffer = [];
  }
}

export const logger = Logger.getInstance();
