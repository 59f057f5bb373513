/**
 * Log Configuration Management
 *
 * Reads logging configuration from environment variables, with defaults
 * suitable for local runs. The result is cached until `resetConfig()`.
 */

import { LogLevel } from './logging-types';

export interface LogConfig {
  fileLoggingEnabled: boolean;
  logDirectory: string;
  logLevel: LogLevel;
  maxFileSize?: number;
  consoleOutput: ConsoleOutput;
}

/** Where console log lines go. A stdio MCP server owns stdout, so it uses stderr. */
export type ConsoleOutput = 'stdout' | 'stderr' | 'none';

export class LogConfigManager {
  private static config: LogConfig | null = null;

  /**
   * Gets the current log configuration, initializing it if necessary.
   */
  static getConfig(): LogConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  private static loadConfig(): LogConfig {
    return {
      fileLoggingEnabled: this.parseBoolean(process.env.WORKFLOW_FILE_LOGGING_ENABLED, false),
      logDirectory: process.env.WORKFLOW_LOG_DIRECTORY || 'logs/',
      logLevel: this.parseLogLevel(process.env.WORKFLOW_LOG_LEVEL, LogLevel.INFO),
      maxFileSize: this.parseNumber(process.env.WORKFLOW_MAX_FILE_SIZE, 10 * 1024 * 1024), // 10MB
      consoleOutput: this.parseConsoleOutput(process.env.WORKFLOW_CONSOLE_OUTPUT),
    };
  }

  static validateConfig(): string[] {
    const config = this.getConfig();
    const errors: string[] = [];

    if (!config.logDirectory) {
      errors.push('Log directory cannot be empty');
    }

    if (config.maxFileSize !== undefined && config.maxFileSize < 1024) {
      errors.push('Max file size must be at least 1KB');
    }

    return errors;
  }

  /**
   * Resets the configuration cache (useful for testing).
   */
  static resetConfig(): void {
    this.config = null;
  }

  private static parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  private static parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
    if (!value) return defaultValue;

    const upperValue = value.toUpperCase();
    const match = Object.values(LogLevel).find((level) => level === upperValue);
    return match ?? defaultValue;
  }

  private static parseConsoleOutput(value: string | undefined): ConsoleOutput {
    switch (value?.toLowerCase()) {
      case 'stderr':
        return 'stderr';
      case 'none':
        return 'none';
      default:
        return 'stdout';
    }
  }

  private static parseNumber(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;

    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }
}
