/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";
import { AuditRecord, Language } from "./types";

export interface EngineEventMap {
  ValidationAuditEvent: AuditRecord;
  CacheHitEvent: { submissionHash: string; usageCount: number; coalesced: boolean };
  CacheMissEvent: { submissionHash: string; language: Language };
  PolicyReevaluationEvent: {
    submissionHash: string;
    previousPolicyVersion: string;
    policyVersion: string;
    isValid: boolean;
    reanalyzed: boolean;
  };
  AnalysisTimeoutEvent: {
    submissionHash: string;
    language: Language;
    stage: string;
    budgetMs: number;
    elapsedMs: number;
  };
  SecurityEvent: {
    submissionHash: string;
    language: Language;
    categories: string[];
    ruleIds: string[];
  };
  StorageErrorEvent: { operation: string; key?: string; message: string };
  ArtifactDeletedEvent: { submissionHash: string; releasedReference?: string };
  ListenerErrorEvent: { type: string; error: string; listener: string };
}

export type EventType = keyof EngineEventMap;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: EngineEventMap[K];
  meta?: Record<string, unknown>;
}

type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener): void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: EngineEventMap[K], meta?: Record<string, unknown>): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    this.notify(this.listeners.get(type), envelope);
    this.notify(this.listeners.get("any"), envelope);

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;
    const since = options?.since;
    const type = options?.type;

    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (type) {
      filtered = filtered.filter((e) => e.type === type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  /**
   * Typed view of the history for a single event type
   */
  ofType<K extends EventType>(type: K): EventEnvelope<K>[] {
    return this.history.filter((e): e is EventEnvelope<K> => e.type === type);
  }

  private notify(listeners: Set<Listener> | undefined, envelope: EventEnvelope): void {
    if (!listeners) return;
    for (const l of listeners) {
      try {
        l(envelope);
      } catch (e) {
        if (envelope.type === "ListenerErrorEvent") {
          // A failing error listener must not recurse
          console.error(`[EventBus] Listener error for ${envelope.type}:`, e);
          continue;
        }
        this.emit("ListenerErrorEvent", {
          type: envelope.type,
          error: e instanceof Error ? e.message : String(e),
          listener: l.name || "anonymous",
        });
      }
    }
  }
}
