/**
 * Destinations for per-validation audit records
 */

import { EventBus } from "../eventBus";
import { AuditRecord } from "../types";

export interface AuditSink {
  record(entry: AuditRecord): Promise<void>;
  close?(): Promise<void>;
}

/** Publishes each record as a ValidationAuditEvent */
export class EventBusAuditSink implements AuditSink {
  constructor(private readonly eventBus: EventBus) {}

  async record(entry: AuditRecord): Promise<void> {
    this.eventBus.emit("ValidationAuditEvent", entry);
  }
}

/** Keeps records in memory, newest last */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async record(entry: AuditRecord): Promise<void> {
    this.records.push(entry);
  }
}

export class CompositeAuditSink implements AuditSink {
  private readonly sinks: AuditSink[];

  constructor(sinks: AuditSink[]) {
    this.sinks = [...sinks];
  }

  async record(entry: AuditRecord): Promise<void> {
    for (const sink of this.sinks) {
      await sink.record(entry);
    }
  }

  async close(): Promise<void> {
    for (const sink of this.sinks) {
      if (sink.close) await sink.close();
    }
  }
}
