/**
 * Logging and timing for the EML sender.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/**
 * Log entry structure.
 */
export interface LogEntry {
  /** Log level. */
  level: LogLevel;
  /** Log message. */
  message: string;
  /** Timestamp. */
  timestamp: Date;
  /** Session context. */
  context?: SessionContext;
  /** Additional fields. */
  fields?: Record<string, unknown>;
}

/**
 * Identifies one SMTP session (one worker in parallel mode) in log output.
 */
export interface SessionContext {
  /** Session identifier, e.g. `worker-2`. */
  sessionId: string;
  /** Operation name. */
  operation: string;
  /** Start time. */
  startTime: Date;
  /** Additional tags. */
  tags: Record<string, string>;
}

/**
 * Creates a new session context.
 */
export function createSessionContext(
  sessionId: string,
  operation: string,
  tags?: Record<string, string>
): SessionContext {
  return {
    sessionId,
    operation,
    startTime: new Date(),
    tags: tags ?? {},
  };
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, error?: Error, fields?: Record<string, unknown>): void;
  withContext(context: SessionContext): Logger;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/**
 * Parses a log level name, falling back to the given default.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized) ?? fallback;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly context?: SessionContext;

  constructor(minLevel: LogLevel = LogLevel.Info, context?: SessionContext) {
    this.minLevel = minLevel;
    this.context = context;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    const errorFields = error ? { error: error.message } : {};
    this.log(LogLevel.Error, message, { ...fields, ...errorFields });
  }

  withContext(context: SessionContext): Logger {
    return new ConsoleLogger(this.minLevel, context);
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const output = formatEntry({
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      fields,
    });

    switch (level) {
      case LogLevel.Debug:
        console.debug(output);
        break;
      case LogLevel.Info:
        console.info(output);
        break;
      case LogLevel.Warn:
        console.warn(output);
        break;
      case LogLevel.Error:
        console.error(output);
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }
}

/**
 * Formats a log entry as a single console line.
 */
export function formatEntry(entry: LogEntry): string {
  const parts: string[] = [entry.timestamp.toISOString(), `[${entry.level.toUpperCase()}]`];

  if (entry.context) {
    parts.push(`[${entry.context.sessionId}]`);
  }

  parts.push(entry.message);

  if (entry.fields && Object.keys(entry.fields).length > 0) {
    parts.push(JSON.stringify(entry.fields));
  }

  return parts.join(' ');
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  debug(): void {
    // No-op
  }
  info(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  error(): void {
    // No-op
  }
  withContext(): Logger {
    return this;
  }
}

/**
 * Logger that keeps entries in memory, for tests.
 */
export class InMemoryLogger implements Logger {
  private entries: LogEntry[] = [];
  private readonly context?: SessionContext;

  constructor(context?: SessionContext) {
    this.context = context;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.addEntry(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.addEntry(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.addEntry(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    const errorFields = error ? { error: error.message } : {};
    this.addEntry(LogLevel.Error, message, { ...fields, ...errorFields });
  }

  withContext(context: SessionContext): Logger {
    const child = new InMemoryLogger(context);
    // Share the entries array
    child.entries = this.entries;
    return child;
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Messages only, in logging order. */
  getMessages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  /** Messages logged under the given session id. */
  getMessagesFor(sessionId: string): string[] {
    return this.entries
      .filter((entry) => entry.context?.sessionId === sessionId)
      .map((entry) => entry.message);
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private addEntry(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      fields,
    });
  }
}

/**
 * Timer for measuring durations.
 */
export class Timer {
  private readonly startTime: number;

  private constructor() {
    this.startTime = Date.now();
  }

  /** Starts a new timer. */
  static start(): Timer {
    return new Timer();
  }

  /** Gets elapsed time in milliseconds. */
  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(minLevel?: LogLevel): Logger {
  return new ConsoleLogger(minLevel);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}
