export type Logger = (message: string, data?: Record<string, unknown>) => void;

export const consoleLogger: Logger = (message, data) => {
  if (data) {
    console.log(message, data);
  } else {
    console.log(message);
  }
};

/**
 * Wraps a logger so that it only writes when debug is on
 */
export function debugLogger(debug: boolean, logger: Logger): Logger {
  return (message, data) => {
    if (debug) {
      logger(message, data);
    }
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
