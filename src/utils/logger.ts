export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

interface LoggerConfig {
  level: LogLevel;
  showTimestamps?: boolean;
}

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL,
    showTimestamps: false
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  // Create a contextual logger
  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  private format(message: string, context?: string): string {
    const stamp = this.config.showTimestamps ? `${new Date().toISOString()} ` : '';
    const prefix = context ? `[${context}] ` : '';
    return `${stamp}${prefix}${message}`;
  }

  // Core logging methods
  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;

    const formattedMessage = this.format(message, context);

    // In quiet mode, only show essential completion messages
    if (this.config.level === LogLevel.QUIET) {
      if (level === LogLevel.QUIET) {
        console.log(formattedMessage);
      }
      return;
    }

    console.log(formattedMessage);
    if (data !== undefined) {
      console.log(data);
    }
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    // Errors always show unless in quiet mode
    if (this.config.level > LogLevel.QUIET) {
      console.error(this.format(message, context));
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  warn(message: string, context?: string, data?: unknown): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.warn(this.format(`⚠ ${message}`, context));
      if (data !== undefined) {
        console.warn(data);
      }
    }
  }

  // Per-page progress lines
  success(label: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✓ ${label.padEnd(14)} ${message}`);
    }
  }

  failure(label: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✗ ${label.padEnd(14)} ${message}`);
    }
  }

  processing(label: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`⏳ ${label.padEnd(14)} ${message}`);
    }
  }

  separator(): void {
    if (this.config.level >= LogLevel.NORMAL && this.config.level < LogLevel.DEBUG) {
      console.log('━'.repeat(60));
    }
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

// Export singleton instance
export const logger = Logger.getInstance();

export const LOG_LEVEL_NAMES = ['quiet', 'normal', 'verbose', 'debug'] as const;
export type LogLevelName = typeof LOG_LEVEL_NAMES[number];

const LOG_LEVEL_ALIASES: Record<string, LogLevelName> = {
  q: 'quiet',
  n: 'normal',
  v: 'verbose',
  d: 'debug'
};

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some(name => name === value);
}

// Lowercase and expand single-letter aliases; unknown names pass through unchanged
export function normalizeLogLevelName(raw: string): string {
  const lower = raw.trim().toLowerCase();
  return LOG_LEVEL_ALIASES[lower] ?? lower;
}

// Helper to parse log level from string
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (normalizeLogLevelName(level)) {
    case 'quiet':
      return LogLevel.QUIET;
    case 'verbose':
      return LogLevel.VERBOSE;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};
