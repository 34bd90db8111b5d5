/**
 * Resolver factories for wiring a notifier in an application's composition root.
 *
 * @example
 * ```ts
 * const app = createResolver();
 * app.set(reachabilityConfig, () => ({
 *   hostname: "api.example.com",
 *   allowsCellularAccess: false,
 * }));
 *
 * const notifier = app.get(reachabilityNotifier);
 *
 * // Later: stops monitoring and drops watchers
 * app.delete(reachabilityNotifier);
 * ```
 */

import type {
  Factory,
  ReachabilityConfig,
  ReachabilityProviderFactory,
  SignalSource,
} from "../types";
import { eventBus, type EventBus, type NetReachEvents } from "../eventBus";
import { createReachabilityNotifier, type ReachabilityNotifier } from "./notifier";
import { browserReachabilityProvider, onlineSignalSource } from "./services";

/**
 * Host to monitor. Defaults to the page's own host, cellular allowed.
 */
export const reachabilityConfig: Factory<ReachabilityConfig> = () => ({
  hostname: typeof location !== "undefined" ? location.hostname : "localhost",
  allowsCellularAccess: true,
});

export const reachabilityProviderFactory: Factory<
  ReachabilityProviderFactory
> = () => browserReachabilityProvider;

export const reachabilitySignalSources: Factory<SignalSource[]> = () => [
  onlineSignalSource,
];

export const reachabilityBus: Factory<EventBus<NetReachEvents>> = () =>
  eventBus;

export const reachabilityNotifier: Factory<ReachabilityNotifier> = ({ get }) =>
  createReachabilityNotifier(get(reachabilityConfig), {
    providerFactory: get(reachabilityProviderFactory),
    signalSources: get(reachabilitySignalSources),
    bus: get(reachabilityBus),
  });
