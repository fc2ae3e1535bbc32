/**
 * ActivityLog - append-only record of routing decisions
 *
 * One text line per event:
 *   ADD  <network> via <gateway> metric <metric>
 *   DEL  <network> removed <count>
 *   FWD  <packet> via <gateway>
 *   DROP <packet>
 *
 * The Router only sees the sink interface, so the file system stays out of
 * the core and tests use MemoryLogSink.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import type { IPAddress } from '../core/types';
import type { RouteEntry } from '../routing/RoutingTable';
import { formatPacket, type Packet } from '../routing/Forwarding';

export type ActivityKind = 'ADD' | 'DEL' | 'FWD' | 'DROP';

export type ActivityEvent =
  | { kind: 'ADD'; route: RouteEntry }
  | { kind: 'DEL'; network: IPAddress; removed: number }
  | { kind: 'FWD'; packet: Packet; gateway: IPAddress }
  | { kind: 'DROP'; packet: Packet };

export interface ActivityLogSink {
  append(line: string): void;
}

export function formatActivity(event: ActivityEvent): string {
  switch (event.kind) {
    case 'ADD':
      return `ADD ${event.route.network} via ${event.route.gateway} metric ${event.route.metric}`;
    case 'DEL':
      return `DEL ${event.network} removed ${event.removed}`;
    case 'FWD':
      return `FWD ${formatPacket(event.packet)} via ${event.gateway}`;
    case 'DROP':
      return `DROP ${formatPacket(event.packet)}`;
  }
}

export class MemoryLogSink implements ActivityLogSink {
  private lines: string[] = [];

  append(line: string): void {
    this.lines.push(line);
  }

  getLines(): string[] {
    return [...this.lines];
  }

  clear(): void {
    this.lines = [];
  }
}

/**
 * Appends to a file opened once, for the lifetime of the session.
 */
export class FileLogSink implements ActivityLogSink {
  private fd: number | null;

  constructor(readonly path: string) {
    this.fd = openSync(path, 'a');
  }

  append(line: string): void {
    if (this.fd === null) {
      throw new Error(`Activity log ${this.path} is closed`);
    }
    writeSync(this.fd, `${line}\n`);
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
