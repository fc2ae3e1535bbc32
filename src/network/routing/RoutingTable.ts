/**
 * RoutingTable - static IPv4 routes with Longest Prefix Match lookup
 *
 * Entries are kept in insertion order. Duplicate networks are allowed; a
 * delete removes every entry whose network matches exactly (value and
 * prefix length).
 *
 * Lookup policy:
 *   - candidates: routes whose network contains the destination
 *   - winner: the longest prefix
 *   - tie on prefix length: the earliest inserted route wins
 *   - metric never takes part in selection; it only orders the display
 */

import { IPAddress } from '../core/types';

export interface RouteEntry {
  /** Destination network (e.g. 10.0.1.0/24) */
  readonly network: IPAddress;
  /** Next-hop gateway, conventionally a /32 host address */
  readonly gateway: IPAddress;
  /** Display cost, lower is listed first */
  readonly metric: number;
}

export function createRouteEntry(network: IPAddress, gateway: IPAddress, metric: number): RouteEntry {
  return Object.freeze({ network, gateway, metric });
}

export function formatRouteEntry(entry: RouteEntry): string {
  return `Network: ${entry.network}, Gateway: ${entry.gateway}, Metric: ${entry.metric}`;
}

export class RoutingTable {
  private routes: RouteEntry[] = [];

  insert(entry: RouteEntry): void {
    this.routes.push(entry);
  }

  /**
   * Remove every route for exactly this network/prefix pair.
   * @returns number of removed routes
   */
  remove(network: IPAddress): number {
    const before = this.routes.length;
    this.routes = this.routes.filter(r => !r.network.equals(network));
    return before - this.routes.length;
  }

  findBestMatch(destination: IPAddress): RouteEntry | null {
    let bestRoute: RouteEntry | null = null;
    let bestPrefix = -1;

    for (const route of this.routes) {
      if (!route.network.contains(destination)) continue;

      const prefix = route.network.getPrefixLength();
      // Strictly greater: the first route at the winning length is kept
      if (prefix > bestPrefix) {
        bestPrefix = prefix;
        bestRoute = route;
      }
    }

    return bestRoute;
  }

  /**
   * Render the table sorted by ascending metric (stable).
   * @returns null when the table is empty
   */
  renderAll(): string[] | null {
    if (this.routes.length === 0) return null;
    return [...this.routes]
      .sort((a, b) => a.metric - b.metric)
      .map(formatRouteEntry);
  }

  getEntries(): RouteEntry[] {
    return [...this.routes];
  }

  size(): number {
    return this.routes.length;
  }
}
