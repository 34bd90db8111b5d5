/**
 * Development-only diagnostics.
 *
 * Uses `process.env.NODE_ENV`, which bundlers (Vite, Webpack, Rollup) replace at
 * build time, so the calls below cost nothing in production builds.
 */

/**
 * Check if running in development mode.
 */
export function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Prefixed console output for conditions the notifier recovers from on its own.
 *
 * @example
 * ```ts
 * dev.warn(`Reachability monitoring for "${hostname}" did not start:`, error);
 * // Development: console.warn('[netreach] Reachability monitoring for ...', error)
 * ```
 */
export namespace dev {
  export function warn(message: string, ...args: unknown[]): void {
    if (isDev()) {
      console.warn(`[netreach] ${message}`, ...args);
    }
  }

  /** Report an error that was caught and not rethrown. */
  export function error(message: string, ...args: unknown[]): void {
    if (isDev()) {
      console.error(`[netreach] ${message}`, ...args);
    }
  }
}
