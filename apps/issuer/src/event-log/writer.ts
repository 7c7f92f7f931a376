/**
 * Event log writer: in-memory append-only store.
 *
 * The orchestrator only needs EventSink. Routes read back through
 * EventLog; a persistent store implements both. MemoryEventLog is for
 * tests and dev mode: it keeps only the newest `maxEvents` records.
 */

import type { EventEnvelope } from "./schemas.js";

export interface EventSink {
  append(event: Omit<EventEnvelope, "seq">): Promise<EventEnvelope>;
}

export interface EventLog extends EventSink {
  list(fromSeq?: number): Promise<EventEnvelope[]>;
  /** Events appended so far (equals the last seq). */
  count(): Promise<number>;
}

export const MEMORY_EVENT_LOG_DEFAULT_MAX = 10_000;

export class MemoryEventLog implements EventLog {
  private events: EventEnvelope[] = [];
  private lastSeq = 0;

  constructor(private readonly maxEvents: number = MEMORY_EVENT_LOG_DEFAULT_MAX) {
    if (!Number.isInteger(maxEvents) || maxEvents < 1) {
      throw new RangeError(`MemoryEventLog: maxEvents must be a positive integer, got ${maxEvents}`);
    }
  }

  async append(event: Omit<EventEnvelope, "seq">): Promise<EventEnvelope> {
    this.lastSeq += 1;
    const record: EventEnvelope = {
      seq: this.lastSeq,
      type: event.type,
      timestamp: event.timestamp,
      signer: event.signer,
      payload: { ...event.payload },
    };
    this.events.push(record);
    if (this.events.length > this.maxEvents) {
      this.events = this.events.slice(this.events.length - this.maxEvents);
    }
    return record;
  }

  async list(fromSeq: number = 0): Promise<EventEnvelope[]> {
    return this.events.filter((e) => e.seq >= fromSeq).map((e) => ({ ...e }));
  }

  async count(): Promise<number> {
    return this.lastSeq;
  }
}
