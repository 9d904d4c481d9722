type LogFn = (...args: unknown[]) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

function prefix(level: string, scope?: string): string {
  return scope ? `[${level}] [${scope}]` : `[${level}]`;
}

/**
 * All logging goes to stderr to avoid corrupting stdio MCP transport on stdout.
 * Never pass passwords, TOTP values or notes to a logger.
 */
export function createLogger(scope?: string): Logger {
  return {
    info: (...args) => console.error(prefix('INFO', scope), ...args),
    warn: (...args) => console.error(prefix('WARN', scope), ...args),
    error: (...args) => console.error(prefix('ERROR', scope), ...args),
    debug: (...args) => {
      if (process.env.DEBUG) console.error(prefix('DEBUG', scope), ...args);
    },
  };
}

export const logger = createLogger();
