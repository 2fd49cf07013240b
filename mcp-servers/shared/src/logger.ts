/**
 * Prefixed stderr logging
 * stdout belongs to the MCP JSON-RPC stream, so nothing here writes to it
 */

export interface Logger {
  info(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(prefix: string): Logger {
  return {
    info(message: string): void {
      console.error(`[${prefix}] ${message}`);
    },
    error(message: string, error?: unknown): void {
      if (error === undefined) {
        console.error(`[${prefix}] ERROR: ${message}`);
      } else {
        console.error(`[${prefix}] ERROR: ${message}`, error);
      }
    }
  };
}

/** Logger that discards everything; handy for tests and quiet callers */
export const silentLogger: Logger = {
  info: () => {},
  error: () => {}
};
