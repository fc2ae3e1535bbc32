/**
 * Integration: a full shell session against a file-backed activity log
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Router, RouterShell, FileLogSink, Logger } from '@/network';
import { createRouterStore } from '@/store/routerStore';
import { loadConfig } from '@/config';

describe('Router session', () => {
  let dir: string;

  beforeEach(() => {
    Logger.reset();
    dir = mkdtempSync(join(tmpdir(), 'router-session-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should route, log every decision and survive bad input', () => {
    const config = loadConfig({ logFile: join(dir, 'router.log') }, {});
    const sink = new FileLogSink(config.logFile);
    const shell = new RouterShell({
      router: new Router(sink),
      store: createRouterStore(config.historyLimit),
      prompt: config.prompt,
    });

    const script = [
      'add 10.0.0.0/8 192.0.2.1 20',
      'add 10.1.0.0/16 192.0.2.2 10',
      'add 10.1.0.0/33 192.0.2.3 5',
      'add 999.1.1.1 192.0.2.3 5',
      'send 172.16.0.1 10.1.2.3 TCP',
      'send 172.16.0.1 10.2.0.0 TCP',
      'send 172.16.0.1 192.0.0.0 ICMP',
      'del 10.1.0.0/16',
      'del 10.1.0.0/24',
      'send 172.16.0.1 10.1.2.3 TCP',
      'show',
      'stats',
      'exit',
    ];

    const outputs: string[] = [];
    for (const line of script) {
      outputs.push(shell.execute(line));
      if (shell.isClosed()) break;
    }
    sink.close();

    expect(outputs[2]).toBe('Error: Invalid prefix length: 33. Allowed range: 0-32.');
    expect(outputs[4]).toBe(
      'Packet from 172.16.0.1/32 to 10.1.2.3/32 [TCP]\nForwarding packet via gateway: 192.0.2.2/32',
    );
    expect(outputs[9]).toBe(
      'Packet from 172.16.0.1/32 to 10.1.2.3/32 [TCP]\nForwarding packet via gateway: 192.0.2.1/32',
    );
    expect(outputs[10]).toBe(
      'Current routing table:\n  Network: 10.0.0.0/8, Gateway: 192.0.2.1/32, Metric: 20',
    );
    expect(outputs[11]).toBe('Forwarded: 3\nDropped: 1');
    expect(shell.isClosed()).toBe(true);

    expect(readFileSync(config.logFile, 'utf8').split('\n')).toEqual([
      'ADD 10.0.0.0/8 via 192.0.2.1/32 metric 20',
      'ADD 10.1.0.0/16 via 192.0.2.2/32 metric 10',
      'FWD Packet from 172.16.0.1/32 to 10.1.2.3/32 [TCP] via 192.0.2.2/32',
      'FWD Packet from 172.16.0.1/32 to 10.2.0.0/32 [TCP] via 192.0.2.1/32',
      'DROP Packet from 172.16.0.1/32 to 192.0.0.0/32 [ICMP]',
      'DEL 10.1.0.0/16 removed 1',
      'DEL 10.1.0.0/24 removed 0',
      'FWD Packet from 172.16.0.1/32 to 10.1.2.3/32 [TCP] via 192.0.2.1/32',
      '',
    ]);

    expect(Logger.getLogsByEvent('router:parse-error')).toHaveLength(2);
  });
});
