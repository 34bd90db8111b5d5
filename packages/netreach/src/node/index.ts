/**
 * Node.js entry point.
 */

export {
  dnsReachabilityProvider,
  dnsProbe,
  type DnsReachabilityOptions,
  type ReachabilityProbe,
} from "./dnsProvider";
