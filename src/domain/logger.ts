/**
 * Structured JSON logger
 *
 * One JSON object per line. The default sink is stderr so that library
 * output never mixes with a caller's stdout; callers can route lines
 * elsewhere with setSink(). Child loggers share the root's level and sink.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (line: string) => void;

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

/** Mutable settings shared by a logger and its children */
export interface LoggerState {
  level: LogLevel;
  sink: LogSink;
}

export interface UpstreamCall {
  url: string;
  status: number;
  latencyMs: number;
  requestId?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const writeToStderr: LogSink = (line) => {
  console.error(line);
};

export class Logger {
  private readonly state: LoggerState;
  private readonly bindings: LogContext;

  constructor(options: LoggerOptions = {}, bindings: LogContext = {}, state?: LoggerState) {
    this.state = state ?? {
      level: options.level ?? 'info',
      sink: options.sink ?? writeToStderr,
    };
    this.bindings = bindings;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  setSink(sink: LogSink): void {
    this.state.sink = sink;
  }

  /**
   * Logger that adds `bindings` to every entry
   */
  child(bindings: LogContext): Logger {
    return new Logger({}, { ...this.bindings, ...bindings }, this.state);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.state.level];
  }

  private write(level: LogEntry['level'], message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    };

    this.state.sink(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  /**
   * One completed round trip to a data endpoint
   */
  logUpstreamCall(call: UpstreamCall): void {
    this.debug('Upstream API call', {
      requestId: call.requestId,
      upstreamUrl: call.url,
      upstreamStatus: call.status,
      latencyMs: call.latencyMs,
    });
  }
}

export const logger = new Logger();
