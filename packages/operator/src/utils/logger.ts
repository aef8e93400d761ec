/**
 * Structured Logger
 *
 * One JSON object per line with service and operation context.
 * Bigint amounts are written as decimal strings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  operation?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

export type LogSink = (line: string) => void;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON.stringify replacer for bigint values.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  constructor(
    private readonly context: LogContext = {},
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = (line) => console.log(line)
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = Object.fromEntries(
      Object.entries({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...this.context,
        ...context,
      }).filter(([_, v]) => v !== undefined)
    );

    const error = entry.error;
    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.sink(JSON.stringify(entry, bigintReplacer));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.sink);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
    sink?: LogSink;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'marketplace-operator' },
    options?.level ?? 'info',
    options?.sink
  );
}
