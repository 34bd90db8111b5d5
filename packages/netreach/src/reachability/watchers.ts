/**
 * Append-only watcher registry.
 */

import type { ReachabilityWatcher } from "../types";
import { dev } from "../dev";

export interface WatcherRegistry {
  /** Append a watcher. It only sees transitions that happen after this call. */
  add(watcher: ReachabilityWatcher): void;

  /**
   * Call every watcher registered before this call, in registration order.
   * A watcher that throws is reported and skipped; the rest still run.
   * Stops early once `shouldContinue` returns `false`.
   */
  notify(isEndpointReachable: boolean, shouldContinue?: () => boolean): void;

  /** Remove every watcher. */
  clear(): void;

  readonly size: number;
}

export function watcherRegistry(): WatcherRegistry {
  let watchers: ReachabilityWatcher[] = [];

  return {
    get size() {
      return watchers.length;
    },
    add(watcher) {
      watchers = [...watchers, watcher];
    },
    notify(isEndpointReachable, shouldContinue = () => true) {
      // Watchers added during fan-out land in a new array
      const snapshot = watchers;
      for (const watcher of snapshot) {
        if (!shouldContinue()) return;
        try {
          watcher.onNetworkReachabilityChanged(isEndpointReachable);
        } catch (error) {
          dev.error("Reachability watcher threw:", error);
        }
      }
    },
    clear() {
      watchers = [];
    },
  };
}
