export type Logger = (...args: unknown[]) => void;

/**
 * Debug logger. Prints with a `[Checkout]` prefix, and the scope when given,
 * only when `debug` is on.
 */
export function createLogger(debug: boolean, scope?: string): Logger {
  const prefix = scope ? `[Checkout:${scope}]` : '[Checkout]';
  return (...args: unknown[]) => {
    if (debug) {
      console.log(prefix, ...args);
    }
  };
}
