/**
 * Custom error classes for netreach.
 * Using named error classes helps with error identification and handling.
 */

/**
 * Base class for all netreach errors.
 */
export class NetReachError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NetReachError";
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

/**
 * Thrown by a provider's `startMonitoring()` when it cannot raise change
 * signals. The notifier catches it and keeps running on the remaining sources.
 */
export class MonitorStartError extends NetReachError {
  constructor(
    readonly hostname: string,
    reason: string
  ) {
    super(`Cannot monitor reachability of "${hostname}": ${reason}`);
    this.name = "MonitorStartError";
  }
}

// =============================================================================
// Notifier Lifecycle Errors
// =============================================================================

/**
 * Rejects pending `waitForReachable()` calls when the notifier is disposed.
 */
export class NotifierDisposedError extends NetReachError {
  constructor(hostname: string) {
    super(`Reachability notifier for "${hostname}" was disposed`);
    this.name = "NotifierDisposedError";
  }
}

// =============================================================================
// Context/Hook Errors
// =============================================================================

/**
 * Thrown when a hook finds no notifier in context and none is shared.
 */
export class ProviderMissingError extends NetReachError {
  constructor(hook: string, provider: string) {
    super(`${hook} must be used within a ${provider} or after setupShared()`);
    this.name = "ProviderMissingError";
  }
}
