/**
 * Router Store - session state for the management shell
 *
 * Holds per-session decision counters and a bounded history of forwarding
 * decisions. The routing table itself stays inside the Router; the store
 * only observes what the shell reports.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ForwardOutcome } from '@/network/devices/Router';

export interface DecisionRecord {
  timestamp: number;
  packet: string;
  action: 'forward' | 'drop';
  /** Rendered gateway, null for dropped packets */
  gateway: string | null;
}

export interface RouterSessionState {
  forwarded: number;
  dropped: number;
  history: DecisionRecord[];
  historyLimit: number;

  recordDecision: (outcome: ForwardOutcome) => DecisionRecord;
  reset: () => void;
}

export type RouterStore = StoreApi<RouterSessionState>;

export function createRouterStore(historyLimit: number = 100): RouterStore {
  return createStore<RouterSessionState>((set) => ({
    forwarded: 0,
    dropped: 0,
    history: [],
    historyLimit,

    recordDecision: (outcome) => {
      const record: DecisionRecord = {
        timestamp: Date.now(),
        packet: outcome.renderedPacket,
        action: outcome.result.action,
        gateway: outcome.result.action === 'forward' ? outcome.result.gateway.toString() : null,
      };

      set(state => {
        const history = [...state.history, record];
        return {
          forwarded: state.forwarded + (record.action === 'forward' ? 1 : 0),
          dropped: state.dropped + (record.action === 'drop' ? 1 : 0),
          history: history.length > state.historyLimit
            ? history.slice(history.length - state.historyLimit)
            : history,
        };
      });

      return record;
    },

    reset: () => {
      set({ forwarded: 0, dropped: 0, history: [] });
    },
  }));
}
