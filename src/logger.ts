/**
 * Namespaced console logger.
 *
 * Every component takes a Logger through its options so callers can route
 * output elsewhere; nothing in the package holds a module-level instance.
 */

/** Logger interface */
export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Emit debug lines. Default: false. */
  debug?: boolean;
}

/**
 * Creates a namespaced logger writing `[time] [LEVEL] [namespace] message {data}` lines.
 */
export function createLogger(namespace: string, options?: LoggerOptions): Logger {
  const debugEnabled = options?.debug ?? false;

  const formatMessage = (level: string, message: string, data?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level}] [${namespace}]`;
    if (data) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    namespace,
    info(message: string, data?: Record<string, unknown>): void {
      console.info(formatMessage('INFO', message, data));
    },
    warn(message: string, data?: Record<string, unknown>): void {
      console.warn(formatMessage('WARN', message, data));
    },
    error(message: string, data?: Record<string, unknown>): void {
      console.error(formatMessage('ERROR', message, data));
    },
    debug(message: string, data?: Record<string, unknown>): void {
      if (!debugEnabled) return;
      console.debug(formatMessage('DEBUG', message, data));
    },
  };
}

/**
 * Derive a child logger that shares the parent's sink under a sub-namespace.
 */
export function childLogger(parent: Logger, name: string): Logger {
  const namespace = `${parent.namespace}:${name}`;
  return {
    namespace,
    info: (message, data) => parent.info(`[${name}] ${message}`, data),
    warn: (message, data) => parent.warn(`[${name}] ${message}`, data),
    error: (message, data) => parent.error(`[${name}] ${message}`, data),
    debug: (message, data) => parent.debug(`[${name}] ${message}`, data),
  };
}
