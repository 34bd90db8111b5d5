import type { Disposable } from "../types";

export function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === "object" &&
    value !== null &&
    "dispose" in value &&
    typeof value.dispose === "function"
  );
}

/**
 * Dispose `value` when it has a `dispose()` method; leave anything else alone.
 */
export function tryDispose(value: unknown): void {
  if (isDisposable(value)) {
    value.dispose();
  }
}
