/**
 * Logger utility for the application
 * Provides consistent logging interface across the pipeline stages
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Set by the entry point from its configuration; LOG_LEVEL applies until then
let configuredLevel: LogLevel | undefined;

/**
 * Fix the level for every logger; `undefined` goes back to LOG_LEVEL
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private readonly scope?: string;

  constructor(scope?: string) {
    this.scope = scope;
  }

  // Read on every call so tests and entry points can change the level after import
  private get logLevel(): LogLevel {
    if (configuredLevel) return configuredLevel;
    const fromEnv = process.env.LOG_LEVEL;
    return isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message: this.scope ? `[${this.scope}] ${message}` : message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }

  /**
   * Logger whose messages carry a `[scope]` prefix, e.g. the source name
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }
}

// Export singleton instance
export const logger = new Logger();
