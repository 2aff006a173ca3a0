/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';
export type LogContext = Record<string, unknown>;

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Prefix every line with `target` */
  includeTarget: boolean;
  target: string;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
    includeTarget: true,
    target: 'chat-stream',
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export interface LogRecord {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp?: string;
  target?: string;
}

type Formatter = (record: LogRecord) => string;

const FORMATTERS: Record<LogFormat, Formatter> = {
  json: ({ timestamp, level, target, message, context }) =>
    JSON.stringify({ timestamp, level, target, message, ...context }),

  compact: ({ level, target, message, context }) => {
    const targetStr = target ? ` ${target}:` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${level.toUpperCase()}]${targetStr} ${message}${contextStr}`;
  },

  pretty: ({ timestamp, level, target, message, context }) => {
    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    parts.push(`[${level.toUpperCase()}]`);
    if (target) parts.push(`${target}:`);
    parts.push(message);
    if (context) {
      parts.push('\n  ' + Object.entries(context)
        .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
        .join('\n  '));
    }
    return parts.join(' ');
  },
};

/**
 * Renders one record as a single output line in the given format
 */
export function formatLogLine(format: LogFormat, record: LogRecord): string {
  return FORMATTERS[format](record);
}

/**
 * Line-oriented logger. Writes to stderr by default, since stdout may carry
 * the relayed completion.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;
  private readonly write: (line: string) => void;

  constructor(
    config?: Partial<LoggingConfig>,
    write: (line: string) => void = (line) => console.error(line)
  ) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
    this.write = write;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    this.write(formatLogLine(this.config.format, {
      level,
      message,
      context,
      timestamp: this.config.includeTimestamps ? new Date().toISOString() : undefined,
      target: this.config.includeTarget ? this.config.target : undefined,
    }));
  }
}

/**
 * Logger that drops everything. Used when the host does not supply one.
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Logs a transport launch. The argv is not logged since it carries the API key.
 */
export function logStreamStart(logger: Logger, streamId: string, command: string, url: string): void {
  logger.debug('Starting stream', { streamId, command, url });
}

export function logStreamEnd(
  logger: Logger,
  streamId: string,
  status: string,
  durationMs: number,
  chunks: number
): void {
  logger.debug('Stream finished', { streamId, status, durationMs, chunks });
}

/**
 * Logs an error with the component it came from and any extra fields
 */
export function logError(logger: Logger, error: Error, context: string, extra?: LogContext): void {
  logger.error('Error occurred', {
    ...extra,
    context,
    errorName: error.name,
    errorMessage: error.message,
    stack: error.stack,
  });
}
