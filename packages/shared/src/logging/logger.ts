/**
 * Structured JSON logger with correlation IDs
 * @module @strata/shared/logging/logger
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Correlation ID for request tracing */
  correlationId?: string;
  /** Datanode the entry concerns */
  datanodeId?: string;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Metadata */
  meta?: LogMeta;
  /** Error details */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Pretty print output (development) */
  pretty?: boolean;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

/**
 * Check if a string names a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

/**
 * Structured JSON logger
 */
export class Logger {
  private config: LoggerConfig;
  private meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.meta = {
      ...meta,
      service: config.service || meta.service,
      component: config.component || meta.component,
    };
  }

  /**
   * Check if a log level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  /**
   * Format and output a log entry
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    // Drop unset keys so child loggers don't emit `service: undefined`
    const mergedMeta: LogMeta = {};
    for (const [key, value] of Object.entries({ ...this.meta, ...meta })) {
      if (value !== undefined) {
        mergedMeta[key] = value;
      }
    }
    if (Object.keys(mergedMeta).length > 0) {
      entry.meta = mergedMeta;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      const code = 'code' in error ? error.code : undefined;
      if (typeof code === 'string' || typeof code === 'number') {
        entry.error.code = code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      this.defaultOutput(entry);
    }
  }

  /**
   * Default output to console
   */
  private defaultOutput(entry: LogEntry): void {
    const output = this.config.pretty ? this.formatPretty(entry) : JSON.stringify(entry);

    switch (entry.level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
    }
  }

  /**
   * Format log entry for pretty printing
   */
  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[90m', // Gray
      info: '\x1b[36m',  // Cyan
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
      fatal: '\x1b[35m', // Magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];
    const levelStr = entry.level.toUpperCase().padEnd(5);

    let output = `${entry.timestamp} ${color}${levelStr}${reset} ${entry.message}`;

    if (entry.meta?.component) {
      output += ` ${color}(${entry.meta.component})${reset}`;
    }

    if (entry.meta?.datanodeId) {
      output += ` ${color}[dn ${entry.meta.datanodeId}]${reset}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Create a child logger bound to one datanode
   */
  withDatanode(datanodeId: string): Logger {
    return this.child({ datanodeId });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  /**
   * Log an error message, optionally with the error that caused it
   */
  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

/**
 * Get the default log level based on environment
 */
function getDefaultLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  if (isLogLevel(level)) {
    return level;
  }
  // Quiet during tests unless explicitly set
  return isTestEnvironment() ? 'fatal' : 'info';
}

// eslint-disable-next-line @typescript-eslint/no-unused-vars
function silentOutput(_entry: LogEntry): void {
  // Intentionally empty - suppresses all output
}

/**
 * Create a new logger instance (basic, does not apply test environment detection)
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a logger instance with test environment detection.
 * Output is suppressed during tests unless LOG_LEVEL is set.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const testConfig: Partial<LoggerConfig> = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL) {
    testConfig.level = 'fatal';
    testConfig.output = silentOutput;
  } else if (isLogLevel(process.env.LOG_LEVEL)) {
    testConfig.level = process.env.LOG_LEVEL;
  }

  return new Logger({ ...config, ...testConfig }, meta);
}

/**
 * Default logger instance
 */
export const logger = createLogger({
  level: getDefaultLogLevel(),
  pretty: process.env.NODE_ENV !== 'production',
  service: 'strata-membership',
  output: isTestEnvironment() && !process.env.LOG_LEVEL ? silentOutput : undefined,
});
