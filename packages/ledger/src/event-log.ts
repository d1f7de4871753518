import type { LedgerEvent, LedgerEventBody, LedgerEventHandler } from '@tessera/types';
import type { Logger } from './logger.js';

/**
 * Append-only event log with synchronous fan-out to subscribers.
 * A throwing handler is logged and skipped.
 */
export class EventLog {
  private readonly events: LedgerEvent[] = [];
  private handlers: LedgerEventHandler[] = [];

  constructor(private readonly log: Logger) {}

  append(body: LedgerEventBody): LedgerEvent {
    const event: LedgerEvent = { ...body, sequence: this.events.length };
    this.events.push(event);

    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        this.log.error({ err, event: event.type, sequence: event.sequence }, 'Event handler failed');
      }
    }
    return event;
  }

  subscribe(handler: LedgerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  getAll(): LedgerEvent[] {
    return [...this.events];
  }

  get length(): number {
    return this.events.length;
  }
}
