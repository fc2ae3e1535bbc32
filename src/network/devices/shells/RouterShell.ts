/**
 * RouterShell - line-oriented CLI for the static router
 *
 *   add <network> <gateway> <metric>
 *   del <network>
 *   show
 *   send <source> <destination> <protocol>
 *   stats
 *   help
 *   exit
 *
 * Keywords may be abbreviated to any unique prefix. Parse failures are
 * printed as "Error: <message>" and leave the session running.
 */

import type { Router } from '../Router';
import type { RouterStore } from '@/store/routerStore';
import type { RouterError } from '../../core/errors';
import type { IRouterShell } from './IRouterShell';
import { CommandTrie, type ParamSpec } from './CommandTrie';

export const UNKNOWN_COMMAND = "Unknown command. Type 'help' to see available commands.";

export interface RouterShellOptions {
  router: Router;
  store: RouterStore;
  prompt?: string;
}

const ADD_PARAMS: ParamSpec[] = [
  { name: 'network', description: 'destination network a.b.c.d/n' },
  { name: 'gateway', description: 'next-hop address' },
  { name: 'metric', description: 'non-negative cost' },
];

const DEL_PARAMS: ParamSpec[] = [
  { name: 'network', description: 'exact network a.b.c.d/n' },
];

const SEND_PARAMS: ParamSpec[] = [
  { name: 'source', description: 'source address' },
  { name: 'destination', description: 'destination address' },
  { name: 'protocol', description: 'protocol label, e.g. ICMP' },
];

export class RouterShell implements IRouterShell {
  private readonly router: Router;
  private readonly store: RouterStore;
  private readonly prompt: string;
  private readonly trie = new CommandTrie();
  private closed = false;

  constructor(options: RouterShellOptions) {
    this.router = options.router;
    this.store = options.store;
    this.prompt = options.prompt ?? '> ';
    this.buildCommands();
  }

  getPrompt(): string {
    return this.prompt;
  }

  isClosed(): boolean {
    return this.closed;
  }

  tabComplete(input: string): string | null {
    return this.trie.tabComplete(input);
  }

  getHelp(): string {
    const commands = this.trie.listCommands();
    const width = Math.max(...commands.map(c => c.usage.length)) + 2;
    return [
      '=== IP Router Simulator ===',
      'Available commands:',
      ...commands.map(c => `  ${c.usage.padEnd(width)}- ${c.description}`),
    ].join('\n');
  }

  // ─── Main Execute ──────────────────────────────────────────────────

  execute(rawInput: string): string {
    const trimmed = rawInput.trim();
    if (!trimmed) return '';

    const result = this.trie.match(trimmed);

    switch (result.status) {
      case 'ok':
        return result.node?.action ? result.node.action(result.args) : '';
      case 'empty':
        return '';
      case 'invalid':
        return result.matchedKeywords.length === 0
          ? UNKNOWN_COMMAND
          : result.error ?? `% Invalid input detected at '^' marker.`;
      case 'ambiguous':
      case 'incomplete':
        return result.error ?? UNKNOWN_COMMAND;
    }
  }

  // ─── Commands ──────────────────────────────────────────────────────

  private buildCommands(): void {
    this.trie.register('add', 'add a route (e.g. add 192.168.1.0/24 192.168.1.1 10)',
      (args) => this.cmdAdd(args), ADD_PARAMS);
    this.trie.register('del', 'remove a route (e.g. del 192.168.1.0/24)',
      (args) => this.cmdDel(args), DEL_PARAMS);
    this.trie.register('show', 'show the routing table',
      () => this.cmdShow());
    this.trie.register('send', 'send a packet (e.g. send 10.0.0.1 192.168.1.100 ICMP)',
      (args) => this.cmdSend(args), SEND_PARAMS);
    this.trie.register('stats', 'show forwarding statistics',
      () => this.cmdStats());
    this.trie.register('help', 'show this help',
      () => this.getHelp());
    this.trie.register('exit', 'end the session',
      () => this.cmdExit());
  }

  private cmdAdd(args: string[]): string {
    const [network, gateway, metricText] = args;
    if (network === undefined || gateway === undefined || metricText === undefined || !/^-?\d+$/.test(metricText)) {
      return `Usage: add ${this.params(ADD_PARAMS)}`;
    }

    const result = this.router.addRoute(network, gateway, parseInt(metricText, 10));
    return result.ok ? 'Route added.' : this.formatError(result.error);
  }

  private cmdDel(args: string[]): string {
    const [network] = args;
    if (network === undefined) return `Usage: del ${this.params(DEL_PARAMS)}`;

    const result = this.router.deleteRoute(network);
    if (!result.ok) return this.formatError(result.error);
    return result.value > 0 ? 'Route removed.' : 'Route not found.';
  }

  private cmdShow(): string {
    const routes = this.router.listRoutes();
    if (!routes) return 'Routing table is empty.';
    return ['Current routing table:', ...routes.map(r => `  ${r}`)].join('\n');
  }

  private cmdSend(args: string[]): string {
    const [source, destination, protocol] = args;
    if (source === undefined || destination === undefined || protocol === undefined) {
      return `Usage: send ${this.params(SEND_PARAMS)}`;
    }

    const result = this.router.forward(source, destination, protocol);
    if (!result.ok) return this.formatError(result.error);

    const outcome = result.value;
    this.store.getState().recordDecision(outcome);

    const verdict = outcome.result.action === 'forward'
      ? `Forwarding packet via gateway: ${outcome.result.gateway}`
      : 'Packet dropped (no matching route).';
    return `${outcome.renderedPacket}\n${verdict}`;
  }

  private cmdStats(): string {
    const { forwarded, dropped } = this.store.getState();
    return `Forwarded: ${forwarded}\nDropped: ${dropped}`;
  }

  private cmdExit(): string {
    this.closed = true;
    return '';
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private params(specs: ParamSpec[]): string {
    return specs.map(p => `<${p.name}>`).join(' ');
  }

  private formatError(error: RouterError): string {
    return `Error: ${error.message}`;
  }
}
