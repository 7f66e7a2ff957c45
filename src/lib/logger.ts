/**
 * Structured Logging - Duty Rota Service
 *
 * One JSON object per line, picked up by CloudWatch. Every entry carries the
 * stage and, inside a handler, the API Gateway request id.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(SEVERITY, value);

/**
 * Minimum level from LOG_LEVEL, INFO when unset or unknown
 */
const minimumLevel = (): LogLevel => {
  const configured = (process.env['LOG_LEVEL'] ?? '').toUpperCase();
  return isLogLevel(configured) ? configured : LogLevel.INFO;
};

/**
 * Scheduling errors carry a string `code`; keep it next to the message
 */
const describeError = (error: Error): NonNullable<LogEntry['error']> => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    ...(code && { code }),
    stack: error.stack,
  };
};

export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (SEVERITY[level] < SEVERITY[minimumLevel()]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
      ...(error && { error: describeError(error) }),
    };

    SINKS[level](JSON.stringify(entry));
  }
}

export const logger = new Logger({
  service: 'duty-rota',
  stage: process.env['STAGE'] || 'dev',
});

/**
 * Logger bound to one Lambda invocation
 */
export const createLambdaLogger = (awsRequestId?: string): Logger => logger.child({ requestId: awsRequestId });

/**
 * Route of an API Gateway event, when the event has one
 */
interface RoutedEvent {
  httpMethod?: string;
  resource?: string;
}

export const logLambdaInvocation = (functionName: string, event: RoutedEvent, requestId?: string): void => {
  createLambdaLogger(requestId).info('Lambda invocation started', {
    functionName,
    route: event.httpMethod && event.resource ? `${event.httpMethod} ${event.resource}` : undefined,
  });
};

export const logLambdaCompletion = (functionName: string, durationMs: number, requestId?: string): void => {
  createLambdaLogger(requestId).info('Lambda invocation completed', { functionName, durationMs });
};
