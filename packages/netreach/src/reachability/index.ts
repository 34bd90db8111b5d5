/**
 * Host reachability module.
 *
 * - `setupShared` / `clearShared` / `getShared` - first-call-wins shared notifier
 * - `createReachabilityNotifier` - explicitly owned notifier
 * - `browserReachabilityProvider` / `onlineSignalSource` - browser defaults
 * - `reachabilityNotifier` and friends - resolver factories
 */

export {
  createReachabilityNotifier,
  type ReachabilityNotifier,
  type ReachabilityNotifierOptions,
} from "./notifier";

export {
  setupShared,
  clearShared,
  getShared,
  type SetupSharedOptions,
} from "./shared";

export { isReachableVia } from "./policy";

export { watcherRegistry, type WatcherRegistry } from "./watchers";

export {
  browserReachabilityProvider,
  onlineSignalSource,
  toConnectionState,
} from "./services";

export {
  reachabilityConfig,
  reachabilityProviderFactory,
  reachabilitySignalSources,
  reachabilityBus,
  reachabilityNotifier,
} from "./factories";
