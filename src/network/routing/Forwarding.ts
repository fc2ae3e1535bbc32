/**
 * Forwarding decision for a simulated packet.
 *
 * Nothing is transmitted: the decision only names the gateway the packet
 * would leave through, or reports that it would be dropped.
 */

import { IPAddress } from '../core/types';
import { RoutingTable } from './RoutingTable';

export interface Packet {
  readonly source: IPAddress;
  readonly destination: IPAddress;
  readonly protocol: string;
}

export type ForwardResult =
  | { readonly action: 'forward'; readonly gateway: IPAddress }
  | { readonly action: 'drop' };

export function createPacket(source: IPAddress, destination: IPAddress, protocol: string): Packet {
  return { source, destination, protocol };
}

export function formatPacket(packet: Packet): string {
  return `Packet from ${packet.source} to ${packet.destination} [${packet.protocol}]`;
}

/** Pure with respect to the table: lookup only, no mutation */
export function decide(table: RoutingTable, destination: IPAddress): ForwardResult {
  const route = table.findBestMatch(destination);
  return route ? { action: 'forward', gateway: route.gateway } : { action: 'drop' };
}
