import type { ConnectionState } from "../types";

/**
 * Map a connection state to a reachability verdict.
 *
 * Wi-Fi always counts; cellular counts only when the caller allows it.
 */
export function isReachableVia(
  state: ConnectionState,
  allowsCellularAccess: boolean
): boolean {
  switch (state) {
    case "none":
      return false;
    case "wifi":
      return true;
    case "cellular":
      return allowsCellularAccess;
  }
}
