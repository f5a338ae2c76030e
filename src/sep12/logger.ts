/**
 * logger.ts
 *
 * Logger contract injected into the service and its helpers.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function format(prefix: string, message: string): string {
  return `[${prefix}] ${message}`;
}

/**
 * Writes through `console` with a `[prefix]` tag, one line per entry.
 */
export function createConsoleLogger(prefix = 'sep12'): Logger {
  const write =
    (sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext): void => {
      if (context && Object.keys(context).length > 0) {
        sink(format(prefix, message), context);
      } else {
        sink(format(prefix, message));
      }
    };
  return {
    debug: write(console.debug),
    info: write(console.log),
    warn: write(console.warn),
    error: write(console.error),
  };
}

export const nullLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
