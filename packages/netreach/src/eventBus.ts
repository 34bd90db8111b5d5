/**
 * Typed, name-keyed event bus.
 *
 * Each event name owns its own emitter, created on first use, so listeners of
 * one channel never see payloads of another.
 */

import type { ReachabilityEvent, SingleOrMultipleListeners } from "./types";
import { emitter, type Emitter } from "./emitter";

export interface EventBus<TEvents extends object> {
  /**
   * Subscribe to a named event.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof TEvents>(
    name: K,
    listeners: SingleOrMultipleListeners<TEvents[K]>
  ): VoidFunction;

  /** Publish a payload to every listener of `name`. */
  emit<K extends keyof TEvents>(name: K, payload: TEvents[K]): void;

  /** Number of listeners subscribed to `name`. */
  listenerCount(name: keyof TEvents): number;

  /** Drop listeners of one event, or of every event when `name` is omitted. */
  clear(name?: keyof TEvents): void;
}

export function createEventBus<TEvents extends object>(): EventBus<TEvents> {
  const channels: { [K in keyof TEvents]?: Emitter<TEvents[K]> } = {};
  const names = new Set<keyof TEvents>();

  const channel = <K extends keyof TEvents>(name: K): Emitter<TEvents[K]> => {
    const existing = channels[name];
    if (existing) {
      return existing;
    }
    const created = emitter<TEvents[K]>();
    channels[name] = created;
    names.add(name);
    return created;
  };

  return {
    on(name, listeners) {
      return channel(name).on(listeners);
    },
    emit(name, payload) {
      channels[name]?.emit(payload);
    },
    listenerCount(name) {
      return channels[name]?.size ?? 0;
    },
    clear(name) {
      if (name !== undefined) {
        channels[name]?.clear();
        return;
      }
      for (const each of names) {
        channels[each]?.clear();
      }
    },
  };
}

// =============================================================================
// Process-wide bus
// =============================================================================

/**
 * Name under which reachability transitions are published.
 */
export const REACHABILITY_CHANGED = "netreach:reachability-changed";

export type NetReachEvents = {
  [REACHABILITY_CHANGED]: ReachabilityEvent;
};

/**
 * Process-wide bus for collaborators that prefer passive subscription.
 *
 * @example
 * ```ts
 * eventBus.on(REACHABILITY_CHANGED, ({ isConnectionAvailable }) => {
 *   if (!isConnectionAvailable) pauseUploads();
 * });
 * ```
 */
export const eventBus: EventBus<NetReachEvents> = createEventBus();
