/**
 * Reachability notifier.
 *
 * Wraps one provider for one host, swallows the bootstrap signal every
 * reachability subsystem emits when monitoring starts, and fans every later
 * signal out to watchers, subscribers and the event bus.
 */

import type {
  Listener,
  ReachabilityConfig,
  ReachabilityEvent,
  ReachabilityProviderFactory,
  ReachabilityWatcher,
  SignalSource,
} from "../types";
import { emitter } from "../emitter";
import {
  eventBus,
  REACHABILITY_CHANGED,
  type EventBus,
  type NetReachEvents,
} from "../eventBus";
import { NotifierDisposedError } from "../errors";
import { dev } from "../dev";
import { isReachableVia } from "./policy";
import { watcherRegistry } from "./watchers";
import { browserReachabilityProvider, onlineSignalSource } from "./services";

export interface ReachabilityNotifierOptions {
  /**
   * Builds the provider for the hostname.
   * Default: `browserReachabilityProvider`
   */
  providerFactory?: ReachabilityProviderFactory;

  /**
   * Sources besides the provider whose signals trigger a re-evaluation.
   * Default: `[onlineSignalSource]`
   */
  signalSources?: SignalSource[];

  /**
   * Bus that receives a `REACHABILITY_CHANGED` event per propagated transition.
   * Default: the process-wide `eventBus`
   */
  bus?: EventBus<NetReachEvents>;
}

export interface ReachabilityNotifier extends ReachabilityConfig {
  /**
   * Whether the host is reachable according to the current connection.
   *
   * Advisory only: `true` does not mean a request will succeed, and callers
   * still have to handle network failures. Always `false` without a provider
   * or after `dispose()`.
   */
  readonly isNetworkReachable: boolean;

  /** `true` until the first signal has been received. */
  readonly isInitialConnection: boolean;

  readonly isDisposed: boolean;

  readonly watcherCount: number;

  /**
   * Register a watcher for future transitions. Past transitions are not replayed.
   */
  add(watcher: ReachabilityWatcher): void;

  /**
   * Listen to propagated transitions of this notifier.
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: Listener<ReachabilityEvent>): VoidFunction;

  /**
   * Called after every signal that may have moved `isNetworkReachable`,
   * including the bootstrap signal watchers never see, and on `dispose()`.
   * Meant for snapshot readers such as `useSyncExternalStore`.
   *
   * @returns Unsubscribe function
   */
  onStateChange(listener: VoidFunction): VoidFunction;

  /**
   * Resolves when the host is reachable: immediately if it already is,
   * otherwise on the first transition that reports it reachable.
   * Rejects with `NotifierDisposedError` if the notifier is disposed first.
   */
  waitForReachable(): Promise<void>;

  /**
   * Re-evaluate reachability. Every signal source is wired to this.
   */
  handleSignal(): void;

  /**
   * Unsubscribe from every signal source, stop the provider and drop all
   * watchers and subscribers. Idempotent.
   */
  dispose(): void;
}

/**
 * Wrap a listener so that a throw is reported instead of aborting the
 * dispatch that called it.
 */
function isolated<T>(listener: Listener<T>, label: string): Listener<T> {
  return (value) => {
    try {
      listener(value);
    } catch (error) {
      dev.error(label, error);
    }
  };
}

/**
 * Create a notifier for one host.
 *
 * @example
 * ```ts
 * const notifier = createReachabilityNotifier({
 *   hostname: "api.example.com",
 *   allowsCellularAccess: false,
 * });
 *
 * notifier.add({
 *   onNetworkReachabilityChanged(isEndpointReachable) {
 *     if (isEndpointReachable) flushOutbox();
 *   },
 * });
 * ```
 */
export function createReachabilityNotifier(
  config: ReachabilityConfig,
  options: ReachabilityNotifierOptions = {}
): ReachabilityNotifier {
  const { hostname, allowsCellularAccess } = config;
  const {
    providerFactory = browserReachabilityProvider,
    signalSources = [onlineSignalSource],
    bus = eventBus,
  } = options;

  const provider = providerFactory(hostname);
  const watchers = watcherRegistry();
  const onDispose = emitter();
  const onReachabilityChange = emitter<ReachabilityEvent>();
  const onStateChange = emitter();

  let isInitialConnection = true;
  let disposed = false;

  // Promise for waitForReachable
  let waitPromise: Promise<void> | undefined;
  let waitResolve: VoidFunction | undefined;
  let waitReject: ((reason: unknown) => void) | undefined;

  const settleWait = (error?: unknown) => {
    const resolve = waitResolve;
    const reject = waitReject;
    waitPromise = undefined;
    waitResolve = undefined;
    waitReject = undefined;
    if (error === undefined) {
      resolve?.();
    } else {
      reject?.(error);
    }
  };

  /**
   * Returns `true` exactly once: for the first signal.
   */
  const consumeInitialConnection = (): boolean => {
    if (!isInitialConnection) return false;
    isInitialConnection = false;
    return true;
  };

  const currentlyReachable = (): boolean => {
    if (disposed || !provider) return false;
    return isReachableVia(provider.connectionState(), allowsCellularAccess);
  };

  const isLive = () => !disposed;

  // Readers of the current state: waiters, then snapshot subscribers
  const refreshReaders = () => {
    if (waitResolve && currentlyReachable()) {
      settleWait();
    }
    onStateChange.emit();
  };

  const handleSignal = (): void => {
    if (disposed) return;

    // The bootstrap signal reports the state we started from: no transition
    // for watchers or the bus, but the state itself may have moved
    if (consumeInitialConnection()) {
      refreshReaders();
      return;
    }

    if (!provider) return;

    const isReachable = isReachableVia(
      provider.connectionState(),
      allowsCellularAccess
    );

    // A watcher may tear this notifier down mid fan-out
    watchers.notify(isReachable, isLive);
    if (disposed) return;

    const event: ReachabilityEvent = Object.freeze({
      isConnectionAvailable: isReachable,
      isInitialConnection,
    });
    onReachabilityChange.emit(event);
    if (disposed) return;
    bus.emit(REACHABILITY_CHANGED, event);

    refreshReaders();
  };

  if (provider) {
    onDispose.on(provider.onChange(handleSignal));
  } else {
    dev.warn(
      `No reachability provider for "${hostname}", the host will be reported unreachable`
    );
  }

  for (const source of signalSources) {
    onDispose.on(source.subscribe(handleSignal));
  }

  if (provider) {
    onDispose.on(() => provider.stopMonitoring());
    try {
      provider.startMonitoring();
    } catch (error) {
      dev.warn(`Reachability monitoring for "${hostname}" did not start:`, error);
    }
  }

  return {
    hostname,
    allowsCellularAccess,

    get isNetworkReachable() {
      return currentlyReachable();
    },

    get isInitialConnection() {
      return isInitialConnection;
    },

    get isDisposed() {
      return disposed;
    },

    get watcherCount() {
      return watchers.size;
    },

    add(watcher) {
      if (disposed) {
        dev.warn(`Watcher added to disposed notifier for "${hostname}"`);
        return;
      }
      watchers.add(watcher);
    },

    subscribe(listener) {
      return onReachabilityChange.on(
        isolated(listener, "Reachability subscriber threw:")
      );
    },

    onStateChange(listener) {
      return onStateChange.on(
        isolated(listener, "Reachability state listener threw:")
      );
    },

    waitForReachable() {
      if (disposed) {
        return Promise.reject(new NotifierDisposedError(hostname));
      }
      if (currentlyReachable()) return Promise.resolve();

      if (!waitPromise) {
        waitPromise = new Promise<void>((resolve, reject) => {
          waitResolve = resolve;
          waitReject = reject;
        });
      }

      return waitPromise;
    },

    handleSignal,

    dispose() {
      if (disposed) return;
      disposed = true;
      onDispose.emitAndClear();
      watchers.clear();
      onReachabilityChange.clear();
      if (waitReject) {
        settleWait(new NotifierDisposedError(hostname));
      }
      // isNetworkReachable is now false
      onStateChange.emitAndClear();
    },
  };
}
