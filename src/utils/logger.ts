/**
 * Console logger scoped to a component. Debug output is only printed when
 * the configuration enables it.
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => {
      if (options.debug) console.debug(new Date().toISOString(), '[DEBUG]', prefix, ...args);
    },
    info: (...args: unknown[]) => console.info(new Date().toISOString(), '[INFO]', prefix, ...args),
    warn: (...args: unknown[]) => console.warn(new Date().toISOString(), '[WARN]', prefix, ...args),
    error: (...args: unknown[]) => console.error(new Date().toISOString(), '[ERROR]', prefix, ...args),
  };
}

/**
 * Replace secret query parameters so URLs can be logged
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:apikey|api_key|key)=)[^&]*/gi, '$1***');
}
