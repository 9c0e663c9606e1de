// Console-backed logging, one instance per campaign
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface ConsoleLoggerOptions {
  debugMode?: boolean;
  context?: LogContext;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { debugMode = false, context: base = {} } = options;

  const merge = (context?: LogContext): LogContext => ({ ...base, ...context });

  return {
    debug(message, context) {
      if (debugMode) {
        console.log(`[DEBUG] ${message}`, merge(context));
      }
    },
    info(message, context) {
      console.info(message, merge(context));
    },
    warn(message, context) {
      console.warn(message, merge(context));
    },
    error(message, context) {
      console.error(message, merge(context));
    },
    child(context) {
      return createConsoleLogger({ debugMode, context: merge(context) });
    }
  };
}
