import { useCallback, useSyncExternalStore } from "react";
import { useReachabilityNotifier } from "./context";

/**
 * Current reachability of the host. Re-renders whenever the notifier's state
 * may have moved, the bootstrap signal included.
 *
 * @example
 * ```tsx
 * function OfflineBanner() {
 *   const reachable = useNetworkReachable();
 *   return reachable ? null : <div>You are offline</div>;
 * }
 * ```
 */
export function useNetworkReachable(): boolean {
  const notifier = useReachabilityNotifier();

  const subscribe = useCallback(
    (onStoreChange: VoidFunction) => notifier.onStateChange(onStoreChange),
    [notifier]
  );

  return useSyncExternalStore(
    subscribe,
    () => notifier.isNetworkReachable,
    () => false
  );
}
