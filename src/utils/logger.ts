/**
 * Component loggers. Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let debugEnabled = process.env.DEBUG === 'true';

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...details) => {
      if (debugEnabled) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} ⚠️ ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ✗ ${message}`, ...details),
  };
}
