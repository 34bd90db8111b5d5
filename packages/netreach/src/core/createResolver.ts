/**
 * Factory container for an application's composition root.
 *
 * Each factory is built at most once and its instance is kept until it is
 * deleted or the container is cleared, which disposes it. `set` swaps the
 * implementation behind a factory, which is how tests put a fake provider
 * under the notifier.
 *
 * @example
 * ```ts
 * const app = createResolver();
 * app.set(reachabilityProviderFactory, () => dnsReachabilityProvider());
 *
 * const notifier = app.get(reachabilityNotifier);
 * ```
 */

import type { Factory, Resolver } from "../types";
import { tryDispose } from "./disposable";

export type { Factory, Resolver } from "../types";

export function createResolver(): Resolver {
  // Keyed by the factory the caller asked for, never by its override
  const instances = new Map<Factory, unknown>();
  const overrides = new Map<Factory, Factory>();

  const release = (factory: Factory): boolean => {
    if (!instances.has(factory)) return false;
    const instance = instances.get(factory);
    // Out of the map first: a dispose that calls back into get() rebuilds
    instances.delete(factory);
    tryDispose(instance);
    return true;
  };

  const resolver: Resolver = {
    get<T>(factory: Factory<T>): T {
      if (instances.has(factory)) {
        return instances.get(factory) as T;
      }
      const build = (overrides.get(factory) as Factory<T> | undefined) ?? factory;
      const instance = build(resolver);
      instances.set(factory, instance);
      return instance;
    },

    set<T>(factory: Factory<T>, override: Factory<T>): void {
      overrides.set(factory, override);
      release(factory);
    },

    has(factory: Factory): boolean {
      return instances.has(factory);
    },

    delete: release,

    clear(): void {
      const dropped = [...instances.values()];
      instances.clear();
      dropped.forEach(tryDispose);
    },
  };

  return resolver;
}
