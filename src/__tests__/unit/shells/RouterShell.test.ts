/**
 * RouterShell - command parsing, output text and session state
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RouterShell, UNKNOWN_COMMAND } from '@/network/devices/shells/RouterShell';
import { Router } from '@/network/devices/Router';
import { MemoryLogSink } from '@/network/log/ActivityLog';
import { createRouterStore } from '@/store/routerStore';
import { Logger } from '@/network/core/Logger';

describe('RouterShell', () => {
  let sink: MemoryLogSink;
  let shell: RouterShell;

  beforeEach(() => {
    Logger.reset();
    sink = new MemoryLogSink();
    shell = new RouterShell({ router: new Router(sink), store: createRouterStore() });
  });

  describe('add', () => {
    it('should add a route', () => {
      expect(shell.execute('add 192.168.1.0/24 192.168.1.1 10')).toBe('Route added.');
    });

    it('should print usage when arguments are missing', () => {
      expect(shell.execute('add 10.0.0.0/8 192.0.2.1')).toBe('Usage: add <network> <gateway> <metric>');
    });

    it('should print usage when the metric is not an integer', () => {
      expect(shell.execute('add 10.0.0.0/8 192.0.2.1 ten')).toBe('Usage: add <network> <gateway> <metric>');
      expect(sink.getLines()).toEqual([]);
    });

    it('should report an invalid prefix', () => {
      expect(shell.execute('add 10.0.0.0/33 192.0.2.1 1'))
        .toBe('Error: Invalid prefix length: 33. Allowed range: 0-32.');
    });

    it('should report an invalid octet', () => {
      expect(shell.execute('add 999.1.1.1 192.0.2.1 1')).toBe('Error: Invalid IP octet: 999 in 999.1.1.1');
      expect(shell.execute('show')).toBe('Routing table is empty.');
    });

    it('should report a negative metric', () => {
      expect(shell.execute('add 10.0.0.0/8 192.0.2.1 -1'))
        .toBe('Error: Invalid metric: -1. Metric must be a non-negative safe integer.');
    });

    it('should reject a metric too large to store exactly', () => {
      expect(shell.execute('add 10.0.0.0/8 1.1.1.1 9007199254740993'))
        .toBe('Error: Invalid metric: 9007199254740992. Metric must be a non-negative safe integer.');
      expect(shell.execute('show')).toBe('Routing table is empty.');
      expect(sink.getLines()).toEqual([]);
    });
  });

  describe('del', () => {
    beforeEach(() => {
      shell.execute('add 10.0.0.0/8 192.0.2.1 1');
    });

    it('should remove an exact match', () => {
      expect(shell.execute('del 10.0.0.0/8')).toBe('Route removed.');
      expect(shell.execute('show')).toBe('Routing table is empty.');
    });

    it('should report a missing route', () => {
      expect(shell.execute('del 10.0.0.0/16')).toBe('Route not found.');
    });

    it('should print usage without a network', () => {
      expect(shell.execute('del')).toBe('Usage: del <network>');
    });
  });

  describe('show', () => {
    it('should list routes by metric under a header', () => {
      shell.execute('add 10.2.0.0/16 192.0.2.2 20');
      shell.execute('add 10.1.0.0/16 192.0.2.1 10');

      expect(shell.execute('show')).toBe([
        'Current routing table:',
        '  Network: 10.1.0.0/16, Gateway: 192.0.2.1/32, Metric: 10',
        '  Network: 10.2.0.0/16, Gateway: 192.0.2.2/32, Metric: 20',
      ].join('\n'));
    });

    it('should accept abbreviations', () => {
      expect(shell.execute('sh')).toBe('Routing table is empty.');
    });
  });

  describe('send', () => {
    beforeEach(() => {
      shell.execute('add 192.168.1.0/24 192.168.1.1 10');
    });

    it('should forward a packet with a matching route', () => {
      expect(shell.execute('send 10.0.0.1 192.168.1.100 ICMP')).toBe(
        'Packet from 10.0.0.1/32 to 192.168.1.100/32 [ICMP]\n' +
        'Forwarding packet via gateway: 192.168.1.1/32',
      );
    });

    it('should drop a packet without a route', () => {
      expect(shell.execute('send 10.0.0.1 8.8.8.8 UDP')).toBe(
        'Packet from 10.0.0.1/32 to 8.8.8.8/32 [UDP]\n' +
        'Packet dropped (no matching route).',
      );
    });

    it('should print usage when arguments are missing', () => {
      expect(shell.execute('send 10.0.0.1 8.8.8.8')).toBe('Usage: send <source> <destination> <protocol>');
    });

    it('should count decisions for stats', () => {
      shell.execute('send 10.0.0.1 192.168.1.100 ICMP');
      shell.execute('send 10.0.0.1 8.8.8.8 UDP');
      shell.execute('send 10.0.0.1 8.8.4.4 UDP');
      expect(shell.execute('stats')).toBe('Forwarded: 1\nDropped: 2');
    });

    it('should not count failed sends', () => {
      shell.execute('send 10.0.0 8.8.8.8 UDP');
      expect(shell.execute('stats')).toBe('Forwarded: 0\nDropped: 0');
    });
  });

  describe('session', () => {
    it('should ignore empty lines', () => {
      expect(shell.execute('   ')).toBe('');
    });

    it('should reject unknown commands', () => {
      expect(shell.execute('ping 8.8.8.8')).toBe(UNKNOWN_COMMAND);
    });

    it('should report ambiguous abbreviations', () => {
      expect(shell.execute('s')).toBe('% Ambiguous command: "s" (matches: show, send, stats)');
    });

    it('should close on exit', () => {
      expect(shell.isClosed()).toBe(false);
      expect(shell.execute('exit')).toBe('');
      expect(shell.isClosed()).toBe(true);
    });

    it('should print help with aligned usage', () => {
      const lines = shell.execute('help').split('\n');
      expect(lines[0]).toBe('=== IP Router Simulator ===');
      expect(lines[1]).toBe('Available commands:');
      expect(lines[4]).toBe(`  show${' '.repeat(36)}- show the routing table`);
      expect(lines).toHaveLength(9);
    });

    it('should use the configured prompt', () => {
      expect(shell.getPrompt()).toBe('> ');
      const custom = new RouterShell({
        router: new Router(sink),
        store: createRouterStore(),
        prompt: 'R1# ',
      });
      expect(custom.getPrompt()).toBe('R1# ');
    });

    it('should tab complete command keywords', () => {
      expect(shell.tabComplete('he')).toBe('help ');
      expect(shell.tabComplete('s')).toBeNull();
    });
  });
});
