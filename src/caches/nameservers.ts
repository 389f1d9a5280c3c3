import { A_RECORD, NS_RECORD } from '../constants.js';
import type { NsRecord } from '../types.js';
import { getAncestors } from '../utils.js';
import type { ResolutionCache } from './queries.js';

// finds the closest zone with a usable cached nameserver set
export class DelegationLocator {
  private cache: ResolutionCache;
  private rootHints: readonly string[];

  constructor(cache: ResolutionCache, rootHints: readonly string[]) {
    this.cache = cache;
    this.rootHints = rootHints;
  }

  // walk from the name itself towards the root; the first ancestor whose NS targets have
  // cached addresses wins. falls back to the root hints.
  closestDelegation(name: string): string[] {
    for (const zone of getAncestors(name)) {
      const addresses = this.getNameserverAddresses(zone);
      if (addresses.length > 0) {
        return addresses;
      }
    }
    return [...this.rootHints];
  }

  // cached IPv4 addresses of the nameservers of a zone, in NS record order
  getNameserverAddresses(zone: string): string[] {
    const delegation = this.cache.get({ query: zone, type: NS_RECORD });
    if (!delegation) return [];

    const addresses: string[] = [];
    for (const ns of delegation.records.filter((r): r is NsRecord => r.type === NS_RECORD)) {
      const glue = this.cache.get({ query: ns.value, type: A_RECORD });
      for (const record of glue?.records ?? []) {
        if (record.type === A_RECORD && !addresses.includes(record.address)) {
          addresses.push(record.address);
        }
      }
    }
    return addresses;
  }
}

