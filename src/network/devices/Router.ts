/**
 * Router - static IPv4 forwarding engine
 *
 * Entry point used by the management shell:
 *   addRoute     → parse network/gateway → append route → ADD record
 *   deleteRoute  → parse network → remove exact matches → DEL record
 *   listRoutes   → table rendered by ascending metric
 *   forward      → parse packet → LPM lookup → FWD or DROP record
 *
 * Every text argument is parsed before the table is touched, so a parse
 * failure leaves the table unchanged and writes no activity record.
 * Parse failures come back as `{ ok: false, error }`; any other exception
 * propagates.
 */

import { IPAddress } from '../core/types';
import { InvalidMetricError, RouterError } from '../core/errors';
import { Logger } from '../core/Logger';
import { RoutingTable, createRouteEntry, type RouteEntry } from '../routing/RoutingTable';
import {
  createPacket, decide, formatPacket,
  type ForwardResult, type Packet,
} from '../routing/Forwarding';
import { formatActivity, type ActivityLogSink, type ActivityEvent } from '../log/ActivityLog';

export type RouterResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RouterError };

export interface ForwardOutcome {
  packet: Packet;
  /** "Packet from <src> to <dst> [<proto>]" */
  renderedPacket: string;
  result: ForwardResult;
}

export class Router {
  private readonly table = new RoutingTable();

  constructor(
    private readonly sink: ActivityLogSink,
    readonly name: string = 'Router',
  ) {}

  // ─── Routing Table Management ────────────────────────────────

  addRoute(networkText: string, gatewayText: string, metric: number): RouterResult<RouteEntry> {
    return this.attempt(() => {
      const network = IPAddress.parse(networkText);
      const gateway = IPAddress.parse(gatewayText);
      if (!Number.isSafeInteger(metric) || metric < 0) {
        throw new InvalidMetricError(metric);
      }

      const route = createRouteEntry(network, gateway, metric);
      this.table.insert(route);
      this.record({ kind: 'ADD', route });

      Logger.info(this.name, 'router:route-add',
        `${this.name}: static route ${network} via ${gateway} metric ${metric}`);
      return route;
    });
  }

  /** @returns number of removed routes (0 when nothing matched exactly) */
  deleteRoute(networkText: string): RouterResult<number> {
    return this.attempt(() => {
      const network = IPAddress.parse(networkText);
      const removed = this.table.remove(network);
      this.record({ kind: 'DEL', network, removed });

      Logger.info(this.name, 'router:route-del',
        `${this.name}: removed ${removed} route(s) for ${network}`, { removed });
      return removed;
    });
  }

  /** @returns null when the table is empty */
  listRoutes(): string[] | null {
    return this.table.renderAll();
  }

  getRoutingTable(): RouteEntry[] {
    return this.table.getEntries();
  }

  // ─── Forwarding ──────────────────────────────────────────────

  forward(sourceText: string, destinationText: string, protocol: string): RouterResult<ForwardOutcome> {
    return this.attempt(() => {
      const packet = createPacket(IPAddress.parse(sourceText), IPAddress.parse(destinationText), protocol);
      const renderedPacket = formatPacket(packet);
      const result = decide(this.table, packet.destination);

      if (result.action === 'forward') {
        this.record({ kind: 'FWD', packet, gateway: result.gateway });
        Logger.info(this.name, 'router:forward',
          `${this.name}: ${renderedPacket} via ${result.gateway}`);
      } else {
        this.record({ kind: 'DROP', packet });
        Logger.info(this.name, 'router:drop',
          `${this.name}: no route to ${packet.destination}, dropping`);
      }

      return { packet, renderedPacket, result };
    });
  }

  // ─── Internals ───────────────────────────────────────────────

  private record(event: ActivityEvent): void {
    this.sink.append(formatActivity(event));
  }

  private attempt<T>(operation: () => T): RouterResult<T> {
    try {
      return { ok: true, value: operation() };
    } catch (err) {
      if (!(err instanceof RouterError)) throw err;
      Logger.warn(this.name, 'router:parse-error', `${this.name}: ${err.message}`, { kind: err.kind });
      return { ok: false, error: err };
    }
  }
}
