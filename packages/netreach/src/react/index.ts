/**
 * React bindings.
 */

export {
  ReachabilityScope,
  useReachabilityNotifier,
  type ReachabilityScopeProps,
} from "./context";

export { useNetworkReachable } from "./useNetworkReachable";
