import type { Listener, SingleOrMultipleListeners } from "./types";

/**
 * Event emitter interface for pub/sub pattern.
 *
 * @template T - The type of payload emitted to listeners (defaults to void)
 */
export interface Emitter<T = void> {
  /**
   * Subscribe to events with one or more listeners.
   *
   * @param listeners - Single listener or array of listeners
   * @returns Unsubscribe function (idempotent - safe to call multiple times)
   */
  on(listeners: SingleOrMultipleListeners<T>): VoidFunction;

  /**
   * Emit an event to all registered listeners.
   */
  emit(payload: T): void;

  /**
   * Remove all registered listeners.
   */
  clear(): void;

  /**
   * Emit an event to all listeners, then clear all listeners.
   * Useful for one-time events like disposal.
   */
  emitAndClear(payload: T): void;

  /** Number of registered listeners */
  readonly size: number;
}

/**
 * Creates an event emitter for managing and notifying listeners.
 *
 * - Listeners are called in subscription order
 * - The same listener added twice is called once per emit
 * - Unsubscribe functions are idempotent
 *
 * @example
 * ```ts
 * const changed = emitter<boolean>();
 *
 * const unsubscribe = changed.on((reachable) => {
 *   console.log("Reachable:", reachable);
 * });
 *
 * changed.emit(true); // Logs: "Reachable: true"
 * unsubscribe();
 * ```
 */
export function emitter<T = void>(): Emitter<T> {
  /**
   * Set of registered listeners that will be notified when events are emitted.
   * Using a Set provides O(1) removal and prevents duplicate listeners.
   */
  const listeners = new Set<Listener<T>>();

  const doEmit = (payload: T, clear: boolean) => {
    // Snapshot - Set iteration would include items added during emit
    const copy = Array.from(listeners);
    if (clear) {
      listeners.clear();
    }
    const len = copy.length;
    for (let i = 0; i < len; i++) {
      copy[i](payload);
    }
  };

  return {
    get size() {
      return listeners.size;
    },
    on(newListeners: SingleOrMultipleListeners<T>): VoidFunction {
      const added = Array.isArray(newListeners) ? newListeners : [newListeners];

      for (const listener of added) {
        listeners.add(listener);
      }

      return () => {
        for (const listener of added) {
          listeners.delete(listener);
        }
      };
    },
    /**
     * Emits to a snapshot of the listeners: listeners added during emission
     * wait for the next emit, listeners removed during emission still get
     * this one.
     */
    emit(payload: T): void {
      doEmit(payload, false);
    },
    clear(): void {
      listeners.clear();
    },
    emitAndClear(payload: T): void {
      doEmit(payload, true);
    },
  };
}
