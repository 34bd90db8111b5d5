/**
 * Shared types for netreach.
 */

// =============================================================================
// Listeners
// =============================================================================

export type Listener<T> = (value: T) => void;

export type SingleOrMultipleListeners<T> = Listener<T> | Listener<T>[];

export interface Disposable {
  dispose(): void;
}

// =============================================================================
// Reachability
// =============================================================================

/**
 * Kind of connection the provider currently sees toward the host.
 */
export type ConnectionState = "none" | "wifi" | "cellular";

export interface ReachabilityConfig {
  /** Host whose reachability is monitored */
  readonly hostname: string;

  /**
   * If `true`, the host counts as reachable over cellular (WAN) or Wi-Fi.
   * If `false`, only a Wi-Fi connection makes it reachable.
   */
  readonly allowsCellularAccess: boolean;
}

/**
 * Published on the event bus for every propagated transition.
 */
export interface ReachabilityEvent {
  readonly isConnectionAvailable: boolean;
  readonly isInitialConnection: boolean;
}

/**
 * Anything that wants to be told about reachability transitions.
 */
export interface ReachabilityWatcher {
  onNetworkReachabilityChanged(isEndpointReachable: boolean): void;
}

/**
 * Wraps the platform mechanism that knows which connection exists.
 *
 * Change signals carry no payload: consumers re-query `connectionState()`.
 */
export interface ReachabilityProvider {
  readonly hostname: string;

  /**
   * Current connection toward the host. Synchronous and best effort;
   * may lag behind the physical link.
   */
  connectionState(): ConnectionState;

  /**
   * Begin emitting change signals.
   *
   * @throws MonitorStartError when monitoring cannot start
   */
  startMonitoring(): void;

  /** Stop emitting change signals. Safe to call more than once. */
  stopMonitoring(): void;

  /**
   * Subscribe to raw change signals.
   *
   * @returns Unsubscribe function
   */
  onChange(listener: VoidFunction): VoidFunction;
}

/**
 * Creates a provider for a hostname.
 * Returning `undefined` means no provider could be built for this platform.
 */
export type ReachabilityProviderFactory = (
  hostname: string
) => ReachabilityProvider | undefined;

/**
 * Any source of "something about connectivity changed" signals.
 */
export interface SignalSource {
  subscribe(listener: VoidFunction): VoidFunction;
}

// =============================================================================
// Resolver (Factory-based Dependency Injection)
// =============================================================================

/**
 * Builds one instance from the container. The function itself is the key
 * its instance is cached under.
 */
export type Factory<T = unknown> = (resolver: Resolver) => T;

export interface Resolver {
  /** The cached instance, built through the current override on first use. */
  get<T>(factory: Factory<T>): T;

  /**
   * Build `factory`'s instance with `override` from now on. A cached instance
   * is disposed and dropped.
   */
  set<T>(factory: Factory<T>, override: Factory<T>): void;

  has(factory: Factory): boolean;

  /** Dispose and drop the cached instance. `false` when none was cached. */
  delete(factory: Factory): boolean;

  /** Dispose and drop every cached instance. Overrides stay. */
  clear(): void;
}
