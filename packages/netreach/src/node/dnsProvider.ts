/**
 * Reachability provider for Node.js: polls DNS resolution of the host.
 */

import { lookup } from "node:dns/promises";
import type { ConnectionState, ReachabilityProviderFactory } from "../types";
import { emitter } from "../emitter";
import { dev } from "../dev";

/**
 * Answers which connection currently reaches the host.
 */
export type ReachabilityProbe = (hostname: string) => Promise<ConnectionState>;

export interface DnsReachabilityOptions {
  /** Delay between probes. Default: 10 000 ms */
  intervalMs?: number;

  /** Default: `dnsProbe` */
  probe?: ReachabilityProbe;
}

/**
 * Resolvable host → `"wifi"`, anything else → `"none"`.
 * Node has no notion of a cellular link.
 */
export const dnsProbe: ReachabilityProbe = async (hostname) => {
  try {
    await lookup(hostname);
    return "wifi";
  } catch {
    return "none";
  }
};

/**
 * Provider factory that probes the host on an interval.
 *
 * The state is `"none"` until the first probe settles. The first settled probe
 * always signals; later probes signal only when the state changes. Probes
 * never overlap, and results that settle after `stopMonitoring()` are dropped.
 *
 * @example
 * ```ts
 * import { setupShared } from "netreach";
 * import { dnsReachabilityProvider } from "netreach/node";
 *
 * setupShared({
 *   hostname: "api.example.com",
 *   allowsCellularAccess: true,
 *   providerFactory: dnsReachabilityProvider({ intervalMs: 30_000 }),
 *   signalSources: [],
 * });
 * ```
 */
export function dnsReachabilityProvider(
  options: DnsReachabilityOptions = {}
): ReachabilityProviderFactory {
  const { intervalMs = 10_000, probe = dnsProbe } = options;

  return (hostname) => {
    const changed = emitter();

    let state: ConnectionState = "none";
    let settled = false;
    let probing = false;
    let timer: ReturnType<typeof setInterval> | undefined;
    // Bumped on stop so late results can be recognised
    let generation = 0;

    const check = async (): Promise<void> => {
      if (probing) return;
      probing = true;
      const run = generation;

      try {
        const next = await probe(hostname);
        if (run !== generation) return;

        const first = !settled;
        settled = true;
        if (first || next !== state) {
          state = next;
          changed.emit();
        }
      } catch (error) {
        dev.error(`Reachability probe for "${hostname}" failed:`, error);
      } finally {
        if (run === generation) {
          probing = false;
        }
      }
    };

    return {
      hostname,

      connectionState: () => state,

      startMonitoring() {
        if (timer !== undefined) return;
        timer = setInterval(() => void check(), intervalMs);
        void check();
      },

      stopMonitoring() {
        if (timer === undefined) return;
        clearInterval(timer);
        timer = undefined;
        generation++;
        probing = false;
      },

      onChange: changed.on,
    };
  };
}
