/**
 * Logger - Pub/Sub event system for router debugging
 *
 * The router publishes an event for every table change and forwarding
 * decision. Subscribers can listen to all events or filter by source,
 * event prefix or level. This is diagnostic output; the persistent record
 * of decisions is the ActivityLog.
 */

export type LogLevel = 'info' | 'warn';

export interface RouterLog {
  timestamp: number;
  level: LogLevel;
  source: string;        // router name that emitted the event
  event: string;         // event name (e.g. "router:route-add", "router:drop")
  message: string;       // human-readable description
  data?: Record<string, unknown>;
}

export type LogSubscriber = (log: RouterLog) => void;

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: {
    source?: string;
    event?: string;
    level?: LogLevel;
  };
}

class LoggerSingleton {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: RouterLog[] = [];
  /** Events kept for getLogs(); oldest dropped first */
  private maxLogs = 1000;

  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    const entry: RouterLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && sub.filter.level !== level) continue;
      }
      sub.subscriber(entry);
    }
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  /**
   * Subscribe with an optional filter; returns the id for unsubscribe()
   */
  subscribe(subscriber: LogSubscriber, filter?: Subscription['filter']): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  getLogs(): RouterLog[] {
    return [...this.logs];
  }

  getLogsByEvent(prefix: string): RouterLog[] {
    return this.logs.filter(l => l.event.startsWith(prefix));
  }

  /** Clear history and subscriptions */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
  }
}

export const Logger = new LoggerSingleton();
