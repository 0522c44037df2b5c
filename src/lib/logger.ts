/**
 * Structured Logger
 * One JSON line per entry on stderr; stdout is left to command output.
 * Values under secret-looking keys (tokens, client secrets, authorization codes)
 * are masked before they are written.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  method?: string;
  url?: string;
  /** Milliseconds */
  duration?: number;
  statusCode?: number;
  documentId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** default: 'warn' */
  minLevel?: LogLevel;
  /** default: true */
  enabled?: boolean;
  formatter?: (entry: LogEntry) => string;
  /** default: a line on process.stderr */
  write?: (line: string) => void;
  /** default: true */
  includeStack?: boolean;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SECRET_KEY =
  /^(token|access_?token|refresh_?token|id_?token|client_?secret|secret|password|authorization|code)$/i;
const MASK = '[redacted]';

// Request ID of the callback request being served, if any
const requestScope = new AsyncLocalStorage<string>();

/**
 * Mask secret-looking keys, one level deep into nested objects
 */
export function redact(context: LogContext): LogContext {
  const masked: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SECRET_KEY.test(key) && value !== undefined) {
      masked[key] = MASK;
    } else if (value && typeof value === 'object' && !Array.isArray(value)) {
      masked[key] = Object.fromEntries(
        Object.entries(value).map(([inner, innerValue]) => [
          inner,
          SECRET_KEY.test(inner) ? MASK : innerValue,
        ])
      );
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

export class StructuredLogger {
  readonly component: string;
  private minLevel: LogLevel;
  private enabled: boolean;
  private formatter: (entry: LogEntry) => string;
  private write: (line: string) => void;
  private includeStack: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? 'warn';
    this.enabled = config.enabled ?? true;
    this.formatter = config.formatter ?? ((entry) => JSON.stringify(entry));
    this.write = config.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.includeStack = config.includeStack ?? true;
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    this.emit('error', message, context, error ?? undefined);
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Run an async operation; logs "<operation> completed" with its duration,
   * or "<operation> failed" with the error, which is rethrown
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startedAt });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startedAt }
      );
      throw error;
    }
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.enabled || SEVERITY[level] < SEVERITY[this.minLevel]) {
      return;
    }

    const requestId = context?.requestId ?? requestScope.getStore();
    const merged = requestId ? { ...context, requestId } : context;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      context: merged ? redact(merged) : undefined,
    };
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
        stack: this.includeStack ? error.stack : undefined,
      };
    }
    this.write(this.formatter(entry));
  }
}

export const loggers = {
  auth: new StructuredLogger('Auth'),
  docs: new StructuredLogger('Docs'),
  server: new StructuredLogger('Server'),
  config: new StructuredLogger('Config'),
  retry: new StructuredLogger('Retry'),
};

/**
 * Apply one level to every shared logger (-v / -q)
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function createRequestContext(
  method?: string,
  url?: string
): LogContext & { requestId: string } {
  return { requestId: randomUUID(), method, url };
}

/**
 * Entries logged inside fn, including from awaited calls, carry this request ID
 */
export function withRequestId<T>(requestId: string, fn: () => T): T {
  return requestScope.run(requestId, fn);
}
