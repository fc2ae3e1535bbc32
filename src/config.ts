/**
 * Runtime configuration: explicit override, then environment, then default.
 *
 *   ROUTER_LOG_FILE       activity log path            (router.log)
 *   ROUTER_PROMPT         shell prompt                 ("> ")
 *   ROUTER_DEBUG          print Logger events          (false)
 *   ROUTER_HISTORY_LIMIT  decisions kept in the store  (100)
 */

export interface RouterConfig {
  logFile: string;
  prompt: string;
  debug: boolean;
  historyLimit: number;
}

export const DEFAULT_CONFIG: RouterConfig = {
  logFile: 'router.log',
  prompt: '> ',
  debug: false,
  historyLimit: 100,
};

type Env = Record<string, string | undefined>;

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return parseInt(value, 10);
}

export function loadConfig(overrides: Partial<RouterConfig> = {}, env: Env = process.env): RouterConfig {
  return {
    logFile: overrides.logFile ?? env.ROUTER_LOG_FILE ?? DEFAULT_CONFIG.logFile,
    prompt: overrides.prompt ?? env.ROUTER_PROMPT ?? DEFAULT_CONFIG.prompt,
    debug: overrides.debug ?? parseFlag(env.ROUTER_DEBUG) ?? DEFAULT_CONFIG.debug,
    historyLimit: overrides.historyLimit ?? parseLimit(env.ROUTER_HISTORY_LIMIT) ?? DEFAULT_CONFIG.historyLimit,
  };
}
