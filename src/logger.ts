/**
 * Minimal logging surface used by the bidder and the hand-off conventions.
 */
export interface BidLogger {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

export const silentLogger: BidLogger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Console logger; debug output only when tracing is enabled, warnings always.
 */
export function createConsoleLogger(enabled: boolean): BidLogger {
  return {
    debug: (...args: unknown[]) => {
      if (enabled) {
        console.debug("[bidder]", ...args);
      }
    },
    warn: (...args: unknown[]) => {
      console.warn("[bidder]", ...args);
    },
  };
}
