/**
 * netreach - Host reachability notifier
 *
 * @packageDocumentation
 */

// Core types
export * from "./types";

// Events
export { emitter, type Emitter } from "./emitter";
export {
  createEventBus,
  eventBus,
  REACHABILITY_CHANGED,
  type EventBus,
  type NetReachEvents,
} from "./eventBus";

// Composition root
export { createResolver } from "./core/createResolver";
export { tryDispose, isDisposable } from "./core/disposable";

// Reachability
export * from "./reachability";

// Errors
export {
  NetReachError,
  MonitorStartError,
  NotifierDisposedError,
  ProviderMissingError,
} from "./errors";

// Development utilities
export { dev, isDev } from "./dev";
