/**
 * Default signal sources for browser-like platforms.
 */

import type {
  ConnectionState,
  ReachabilityProviderFactory,
  SignalSource,
} from "../types";
import { emitter } from "../emitter";
import { MonitorStartError } from "../errors";

// =============================================================================
// Network Information API
// =============================================================================

/**
 * The part of `navigator.connection` we read.
 * Not every browser ships it, and few report `type` on desktop.
 */
interface NetworkConnection {
  readonly type?: string;
  addEventListener(type: "change", listener: VoidFunction): void;
  removeEventListener(type: "change", listener: VoidFunction): void;
}

function isNetworkConnection(value: unknown): value is NetworkConnection {
  return (
    typeof value === "object" &&
    value !== null &&
    "addEventListener" in value &&
    typeof value.addEventListener === "function" &&
    "removeEventListener" in value &&
    typeof value.removeEventListener === "function"
  );
}

function networkConnection(): NetworkConnection | undefined {
  if (typeof navigator === "undefined" || !("connection" in navigator)) {
    return undefined;
  }
  const connection: unknown = navigator.connection;
  return isNetworkConnection(connection) ? connection : undefined;
}

/**
 * Translate a Network Information `type` into a connection state.
 * Types that say nothing about the link fall back to `navigator.onLine`.
 */
export function toConnectionState(
  type: string | undefined,
  onLine: boolean
): ConnectionState {
  switch (type) {
    case "wifi":
    case "ethernet":
    case "wimax":
      return "wifi";
    case "cellular":
      return "cellular";
    case "none":
      return "none";
    default:
      return onLine ? "wifi" : "none";
  }
}

// =============================================================================
// Providers
// =============================================================================

/**
 * Default provider factory.
 *
 * Reads `navigator.connection` and listens to its `change` event. Outside a
 * browser there is no `navigator` and no provider is created.
 *
 * `startMonitoring()` throws `MonitorStartError` when the Network Information
 * API is missing; the online/offline source still drives the notifier then.
 * Once monitoring starts, one signal reporting the current state follows on
 * the next microtask.
 *
 * Override for React Native:
 * ```ts
 * import NetInfo from '@react-native-community/netinfo';
 *
 * setupShared({
 *   hostname: "api.example.com",
 *   allowsCellularAccess: true,
 *   providerFactory: (hostname) => netInfoProvider(hostname, NetInfo),
 * });
 * ```
 */
export const browserReachabilityProvider: ReachabilityProviderFactory = (
  hostname
) => {
  if (typeof navigator === "undefined") {
    return undefined;
  }

  const changed = emitter();
  let monitored: NetworkConnection | undefined;

  const onConnectionChange = () => changed.emit();

  return {
    hostname,

    connectionState: () =>
      toConnectionState(networkConnection()?.type, navigator.onLine),

    startMonitoring() {
      if (monitored) return;

      const connection = networkConnection();
      if (!connection) {
        throw new MonitorStartError(
          hostname,
          "the Network Information API is not available"
        );
      }

      connection.addEventListener("change", onConnectionChange);
      monitored = connection;

      // Report the state we start from
      queueMicrotask(() => {
        if (monitored === connection) {
          changed.emit();
        }
      });
    },

    stopMonitoring() {
      if (!monitored) return;
      monitored.removeEventListener("change", onConnectionChange);
      monitored = undefined;
    },

    onChange: changed.on,
  };
};

// =============================================================================
// Secondary Signal Sources
// =============================================================================

/**
 * Signals on `window` online/offline events.
 * Outside a browser, subscribing is a no-op.
 */
export const onlineSignalSource: SignalSource = {
  subscribe(listener) {
    if (typeof window === "undefined") {
      return () => {};
    }

    window.addEventListener("online", listener);
    window.addEventListener("offline", listener);

    return () => {
      window.removeEventListener("online", listener);
      window.removeEventListener("offline", listener);
    };
  },
};
