/**
 * EventBus Unit Tests
 */

import { EventBus, EventEnvelope } from "../src/core/eventBus";

const miss = (n: number) => ({ submissionHash: `hash-${n}`, language: "python" as const });

describe("EventBus", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  test("should emit and record events", () => {
    const received: EventEnvelope[] = [];
    bus.on("CacheMissEvent", (evt) => received.push(evt));

    const envelope = bus.emit("CacheMissEvent", miss(1));

    expect(received).toHaveLength(1);
    expect(received[0].payload).toEqual({ submissionHash: "hash-1", language: "python" });
    expect(envelope.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(bus.history).toHaveLength(1);
    expect(bus.history[0].type).toBe("CacheMissEvent");
  });

  test("should notify 'any' listeners", () => {
    const types: string[] = [];
    bus.on("any", (evt) => types.push(evt.type));

    bus.emit("ArtifactDeletedEvent", { submissionHash: "abc" });
    bus.emit("CacheMissEvent", miss(2));

    expect(types).toEqual(["ArtifactDeletedEvent", "CacheMissEvent"]);
  });

  test("should support removing listeners", () => {
    let callCount = 0;
    const listener = () => {
      callCount++;
    };

    bus.on("CacheMissEvent", listener);
    bus.emit("CacheMissEvent", miss(1));
    bus.off("CacheMissEvent", listener);
    bus.emit("CacheMissEvent", miss(2));

    expect(callCount).toBe(1);
  });

  test("should report listener errors as ListenerErrorEvent", () => {
    bus.on("CacheMissEvent", function failing() {
      throw new Error("Listener error");
    });

    expect(() => bus.emit("CacheMissEvent", miss(1))).not.toThrow();

    const errors = bus.ofType("ListenerErrorEvent");
    expect(errors).toHaveLength(1);
    expect(errors[0].payload).toEqual({ type: "CacheMissEvent", error: "Listener error", listener: "failing" });
  });

  test("should keep ofType typed to one event", () => {
    bus.emit("CacheHitEvent", { submissionHash: "a", usageCount: 3, coalesced: false });
    bus.emit("CacheMissEvent", miss(1));

    const hits = bus.ofType("CacheHitEvent");
    expect(hits.map((hit) => hit.payload.usageCount)).toEqual([3]);
  });
});

describe("EventBus History Retention", () => {
  test("should limit history to maxHistorySize", () => {
    const bus = new EventBus({ maxHistorySize: 10, historyRetentionPolicy: "truncate" });

    for (let i = 0; i < 15; i++) {
      bus.emit("CacheMissEvent", miss(i));
    }

    const hashes = bus.ofType("CacheMissEvent").map((evt) => evt.payload.submissionHash);
    expect(hashes).toHaveLength(10);
    expect(hashes[0]).toBe("hash-5");
    expect(hashes[9]).toBe("hash-14");
  });

  test("should drop the oldest entry when policy is circular", () => {
    const bus = new EventBus({ maxHistorySize: 5, historyRetentionPolicy: "circular" });

    for (let i = 0; i < 10; i++) {
      bus.emit("CacheMissEvent", miss(i));
    }

    const hashes = bus.ofType("CacheMissEvent").map((evt) => evt.payload.submissionHash);
    expect(hashes).toEqual(["hash-5", "hash-6", "hash-7", "hash-8", "hash-9"]);
  });

  test("should provide getHistory with filtering", () => {
    const bus = new EventBus({ maxHistorySize: 100 });

    bus.emit("CacheMissEvent", miss(1));
    bus.emit("ArtifactDeletedEvent", { submissionHash: "x" });
    bus.emit("CacheMissEvent", miss(3));

    expect(bus.getHistory({ type: "CacheMissEvent" })).toHaveLength(2);

    const recent = bus.getHistory({ limit: 2 });
    expect(recent.map((evt) => evt.type)).toEqual(["ArtifactDeletedEvent", "CacheMissEvent"]);
  });

  test("should default to 10000 maxHistorySize", () => {
    const bus = new EventBus();

    for (let i = 0; i < 10001; i++) {
      bus.emit("CacheMissEvent", miss(i));
    }

    expect(bus.history).toHaveLength(10000);
  });
});
