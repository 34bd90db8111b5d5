/**
 * React Context for the reachability notifier.
 */

import {
  createContext,
  createElement,
  memo,
  useContext,
  type FC,
  type ReactNode,
} from "react";

import type { ReachabilityNotifier } from "../reachability/notifier";
import { getShared } from "../reachability/shared";
import { ProviderMissingError } from "../errors";

const NotifierContext = createContext<ReachabilityNotifier | null>(null);

/**
 * Provides a notifier to descendants. Without `notifier`, the shared one
 * at render time is provided.
 */
export interface ReachabilityScopeProps {
  notifier?: ReachabilityNotifier;
  children: ReactNode;
}

export const ReachabilityScope: FC<ReachabilityScopeProps> = memo(
  ({ notifier, children }) =>
    createElement(
      NotifierContext.Provider,
      { value: notifier ?? getShared() ?? null },
      children
    )
);

/**
 * Hook to get the notifier in scope, falling back to the shared one.
 */
export function useReachabilityNotifier(): ReachabilityNotifier {
  const notifier = useContext(NotifierContext) ?? getShared();

  if (!notifier) {
    throw new ProviderMissingError(
      "useReachabilityNotifier",
      "ReachabilityScope"
    );
  }
  return notifier;
}
