/**
 * Interactive router session on stdin/stdout.
 *
 *   npm start
 *   ROUTER_LOG_FILE=/tmp/router.log ROUTER_DEBUG=1 npm start
 */

import { createInterface, type Completer } from 'node:readline';
import { loadConfig } from './config';
import { Logger } from './network/core/Logger';
import { Router } from './network/devices/Router';
import { RouterShell } from './network/devices/shells/RouterShell';
import { FileLogSink } from './network/log/ActivityLog';
import { createRouterStore } from './store/routerStore';

function main(): void {
  const config = loadConfig();

  if (config.debug) {
    Logger.subscribe((log) => {
      console.error(`[${log.level}] ${log.event}: ${log.message}`);
    });
  }

  const sink = new FileLogSink(config.logFile);
  const shell = new RouterShell({
    router: new Router(sink),
    store: createRouterStore(config.historyLimit),
    prompt: config.prompt,
  });

  const completer: Completer = (line) => {
    const completion = shell.tabComplete(line);
    return [completion ? [completion] : [], line];
  };

  const rl = createInterface({ input: process.stdin, output: process.stdout, completer });

  rl.on('line', (line) => {
    const output = shell.execute(line);
    if (output) console.log(output);
    if (shell.isClosed()) {
      rl.close();
      return;
    }
    rl.prompt();
  });

  rl.on('close', () => {
    sink.close();
  });

  console.log(shell.getHelp());
  rl.setPrompt(shell.getPrompt());
  rl.prompt();
}

main();
