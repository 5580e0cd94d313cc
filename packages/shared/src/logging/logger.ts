/**
 * Structured JSON logger with correlation IDs
 * @module @faultline/shared/logging/logger
 */

import { appendFileSync } from 'node:fs';

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
  /** Correlation ID (the wizard session ID) */
  correlationId?: string;
  /** Experiment being edited or run */
  experimentId?: string;
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
 * Log output sink
 */
export type LogOutput = (entry: LogEntry) => void;

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
  output?: LogOutput;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

/**
 * Process-wide output override. Set while the terminal wizard owns the
 * screen so console writes do not tear the display.
 */
let redirectedOutput: LogOutput | null = null;

/**
 * Redirect every logger without a custom output to a sink (null restores the console)
 */
export function setLogOutput(output: LogOutput | null): void {
  redirectedOutput = output;
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
   * Current minimum level
   */
  get level(): LogLevel {
    return this.config.level;
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

    // Merge metadata, dropping unset keys
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
      const code: unknown = Reflect.get(error, 'code');
      if (typeof code === 'string' || typeof code === 'number') {
        entry.error.code = code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else if (redirectedOutput) {
      redirectedOutput(entry);
    } else {
      this.defaultOutput(entry);
    }
  }

  /**
   * Default output to console
   */
  private defaultOutput(entry: LogEntry): void {
    const output = this.config.pretty ? formatPretty(entry) : JSON.stringify(entry);

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
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Create a child logger with a correlation ID
   */
  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  /**
   * Create a child logger bound to a wizard session
   */
  forSession(sessionId: string, experimentId: string): Logger {
    return this.child({ correlationId: sessionId, experimentId });
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
   * Log an error message
   */
  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  /**
   * Log a fatal error message
   */
  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

/**
 * Format log entry for pretty printing
 */
export function formatPretty(entry: LogEntry): string {
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

  if (entry.meta?.correlationId) {
    output += ` ${color}[${entry.meta.correlationId}]${reset}`;
  }

  if (entry.meta?.component) {
    output += ` ${color}(${entry.meta.component})${reset}`;
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
 * Output sink appending one JSON line per entry to a file
 */
export function createFileOutput(filePath: string): LogOutput {
  return (entry) => {
    appendFileSync(filePath, JSON.stringify(entry) + '\n', { encoding: 'utf-8' });
  };
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.VITEST === 'true' ||
    process.env.JEST_WORKER_ID !== undefined
  );
}

/**
 * Check if a string is a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Get the default log level based on environment
 */
function getDefaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  // In test environment, suppress logs unless explicitly set
  return isTestEnvironment() ? 'fatal' : 'info';
}

/**
 * Silent output function for tests
 */
function silentOutput(): void {
  // Suppresses all output
}

/**
 * Create a new logger instance (basic, does not apply test environment detection)
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a logger instance with test environment detection
 * Automatically suppresses output during tests unless LOG_LEVEL is explicitly set
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const testConfig: Partial<LoggerConfig> = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL) {
    testConfig.level = 'fatal';
    testConfig.output = silentOutput;
  }

  return new Logger({
    level: getDefaultLogLevel(),
    pretty: process.env.NODE_ENV !== 'production',
    service: 'faultline',
    ...config,
    ...testConfig,
  }, meta);
}

/**
 * Default logger instance
 */
export const logger = createServiceLogger();

