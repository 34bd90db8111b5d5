/**
 * Process-wide notifier slot.
 *
 * The first `setupShared()` call wins: later calls return the existing
 * notifier and keep its configuration until `clearShared()` empties the slot.
 */

import type { ReachabilityConfig, ReachabilityProviderFactory } from "../types";
import { dev } from "../dev";
import {
  createReachabilityNotifier,
  type ReachabilityNotifier,
  type ReachabilityNotifierOptions,
} from "./notifier";

export interface SetupSharedOptions
  extends ReachabilityConfig,
    ReachabilityNotifierOptions {}

let shared: ReachabilityNotifier | undefined;

/**
 * Create the shared notifier unless one already exists.
 *
 * Never throws: a missing provider or a monitor that fails to start leaves a
 * notifier that reports the host unreachable.
 *
 * @example
 * ```ts
 * setupShared("api.example.com", false);
 *
 * // Same thing, with every option
 * setupShared({
 *   hostname: "api.example.com",
 *   allowsCellularAccess: false,
 *   providerFactory: dnsReachabilityProvider(),
 * });
 * ```
 */
export function setupShared(
  hostname: string,
  allowsCellularAccess: boolean,
  providerFactory?: ReachabilityProviderFactory
): ReachabilityNotifier;
export function setupShared(options: SetupSharedOptions): ReachabilityNotifier;
export function setupShared(
  hostnameOrOptions: string | SetupSharedOptions,
  allowsCellularAccess = true,
  providerFactory?: ReachabilityProviderFactory
): ReachabilityNotifier {
  const options: SetupSharedOptions =
    typeof hostnameOrOptions === "string"
      ? { hostname: hostnameOrOptions, allowsCellularAccess, providerFactory }
      : hostnameOrOptions;

  if (shared) {
    if (
      shared.hostname !== options.hostname ||
      shared.allowsCellularAccess !== options.allowsCellularAccess
    ) {
      dev.warn(
        `setupShared() ignored for "${options.hostname}", already monitoring "${shared.hostname}". Call clearShared() first to reconfigure.`
      );
    }
    return shared;
  }

  const { hostname, allowsCellularAccess: cellular, ...notifierOptions } =
    options;
  const notifier = createReachabilityNotifier(
    { hostname, allowsCellularAccess: cellular },
    notifierOptions
  );
  shared = notifier;
  return notifier;
}

/**
 * Dispose the shared notifier and empty the slot.
 * No-op when there is nothing to clear.
 */
export function clearShared(): void {
  const notifier = shared;
  if (!notifier) return;
  shared = undefined;
  notifier.dispose();
}

/**
 * The shared notifier, if `setupShared()` has been called.
 */
export function getShared(): ReachabilityNotifier | undefined {
  return shared;
}
