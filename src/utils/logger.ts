/**
 * Logger utility for the application
 * Provides a consistent leveled logging interface; scoped children prefix
 * their messages with the module they belong to.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: unknown;
  error?: unknown;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// Children share their parent's threshold, so setLevel applies to the whole tree
interface LoggerState {
  level: LogLevel;
}

export class Logger {
  private readonly state: LoggerState;

  constructor(level?: string, private readonly scope?: string, state?: LoggerState) {
    // Default to 'info' if LOG_LEVEL env var is not set or unknown
    const requested = level ?? process.env.LOG_LEVEL;
    this.state = state ?? { level: isLogLevel(requested) ? requested : 'info' };
  }

  get level(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  child(scope: string): Logger {
    return new Logger(this.state.level, this.scope ? `${this.scope}:${scope}` : scope, this.state);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.level);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      scope: this.scope,
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, scope, data, error } = logMessage;
    const prefix = scope
      ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]`
      : `[${timestamp}] [${level.toUpperCase()}]`;

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
}

// Export singleton instance
export const logger = new Logger();
