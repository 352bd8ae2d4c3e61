import { sanitizeForLogging as redact } from './redaction';

/**
* Structured Logger
*
* Emits one JSON line per entry on stderr, with named child loggers,
* level filtering via LOG_LEVEL and pluggable handlers.
*/

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Logger name, e.g. `licitacoes:sync` */
  service?: string | undefined;
  /** Correlation ID (HTTP request or sync run) */
  correlationId?: string | undefined;
  /** Error details */
  error?: Error | undefined;
  /** Error message (for structured output) */
  errorMessage?: string | undefined;
  /** Error stack trace */
  errorStack?: string | undefined;
  /** Additional metadata */
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  /** Logger name */
  service: string;
  /** Correlation ID attached to every entry */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

// ============================================================================
// Handler Management
// ============================================================================

let handlers: LogHandler[] = [];

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the default console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

function dispatch(entry: LogEntry): void {
  for (const handler of [...handlers]) {
    handler(entry);
  }
}

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
* Get configured log level from environment
* Defaults to 'info' in production, 'debug' elsewhere
*/
function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(getConfiguredLogLevel());
}

// ============================================================================
// Default Handler
// ============================================================================

function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result = redact(obj);
  return (typeof result === 'object' && result !== null && !Array.isArray(result))
    ? result
    : { _redacted: result };
}

/**
* Default console log handler
* All logs go to stderr so stdout stays free for CLI output (scripts/*)
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, correlationId, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (correlationId) logOutput['correlationId'] = correlationId;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = redactSensitiveData(metadata);
  }

  console.error(JSON.stringify(logOutput));
}

handlers.push(consoleHandler);

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound name, correlation ID and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private write(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): void {
    if (!shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    if (this.correlationId) entry.correlationId = this.correlationId;
    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    dispatch(entry);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write('warn', message, metadata);
  }

  /**
  * Log at error level
  * @param err - Optional error object; its message and stack are attached
  */
  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.write('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.write('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  * @returns New Logger instance with merged context
  */
  child(additionalContext: Record<string, unknown>, correlationId?: string): Logger {
    return new Logger(
      this.service,
      correlationId ?? this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Logger name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
