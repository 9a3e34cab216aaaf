/**
 * Logging for the Firebase client.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Sensitive fields to redact from logs.
 */
const SENSITIVE_FIELDS = new Set(['auth', 'authkey', 'auth_key', 'authorization', 'secret', 'password', 'token']);

/**
 * Replaces the value of the `auth` query parameter in a URL.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&]auth=)[^&#]*/g, '$1[REDACTED]');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields and URL credentials from an object.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      result[key] = redactUrl(value);
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    format?: 'json' | 'pretty';
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  /**
   * Formats a log line. Exposed for tests; `log` writes its result.
   */
  formatLine(level: LogLevel, message: string, context?: Record<string, unknown>, timestamp = new Date()): string {
    const mergedContext = redactSensitive({ ...this.context, ...context });
    const levelName = LogLevel[level].toUpperCase();
    const iso = timestamp.toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ timestamp: iso, level: levelName, message, ...mergedContext });
    }

    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';
    return `[${iso}] ${levelName}: ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const line = this.formatLine(level, message, context);
    if (level >= LogLevel.Error) {
      console.error(line);
    } else if (level === LogLevel.Warn) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * No-op logger, the client default.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

/**
 * A captured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[] = [];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    const child = new InMemoryLogger({ ...this.context, ...context });
    // Share the logs array
    child.logs = this.logs;
    return child;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  clear(): void {
    this.logs.length = 0;
  }

  private addLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({
      level,
      message,
      context: redactSensitive({ ...this.context, ...context }),
      timestamp: new Date(),
    });
  }
}
