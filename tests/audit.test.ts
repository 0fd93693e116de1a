/**
 * Audit sink tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { CompositeAuditSink, EventBusAuditSink, MemoryAuditSink } from "../src/core/audit/auditSink";
import { FileAuditSink } from "../src/core/audit/fileAuditSink";
import { createEngineConfig } from "../src/core/config";
import { createValidationEngine } from "../src/core/engine";
import { EventBus } from "../src/core/eventBus";
import { getLogger } from "../src/core/logger";
import { AuditRecord } from "../src/core/types";
import { SAMPLE_HASH } from "./helpers";

function record(overrides: Partial<AuditRecord> = {}): AuditRecord {
  return {
    submissionHash: SAMPLE_HASH,
    language: "python",
    isValid: true,
    outcome: "accepted",
    violationCount: 0,
    durationMs: 4,
    cacheHit: false,
    coalesced: false,
    reevaluated: false,
    policyVersion: "default@1",
    timestamp: "2024-05-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("Audit sinks", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "codegate-audit-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("should append one JSON line per record", async () => {
    const sink = new FileAuditSink(path.join(dir, "logs", "audit.jsonl"));
    await sink.record(record());
    await sink.record(record({ cacheHit: true }));
    await sink.close();

    const lines = fs.readFileSync(sink.path, "utf-8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[1])).toEqual(record({ cacheHit: true }));
  });

  test("should keep concurrent records whole and in call order", async () => {
    const sink = new FileAuditSink(path.join(dir, "audit.jsonl"));
    const counts = Array.from({ length: 20 }, (_, index) => index);
    const pending = counts.map((violationCount) => sink.record(record({ violationCount })));
    await sink.close();
    await Promise.all(pending);

    expect((await sink.readAll()).map((entry) => entry.violationCount)).toEqual(counts);
  });

  test("should read back records and skip torn lines", async () => {
    const file = path.join(dir, "audit.jsonl");
    fs.writeFileSync(file, [JSON.stringify(record()), '{"submissionHash": "ab', JSON.stringify({ note: "x" }), ""].join("\n"));

    expect(await new FileAuditSink(file).readAll()).toEqual([record()]);
  });

  test("should read a missing log as empty", async () => {
    expect(await new FileAuditSink(path.join(dir, "none.jsonl")).readAll()).toEqual([]);
  });

  test("should append to an existing log after reopening", async () => {
    const file = path.join(dir, "audit.jsonl");
    const first = new FileAuditSink(file);
    await first.record(record());
    await first.close();

    const second = new FileAuditSink(file);
    await second.record(record({ isValid: false, outcome: "rejected", violationCount: 2 }));
    await second.close();

    expect((await second.readAll()).map((entry) => entry.outcome)).toEqual(["accepted", "rejected"]);
  });

  test("should fan records out to every sink", async () => {
    const eventBus = new EventBus();
    const memory = new MemoryAuditSink();
    const file = new FileAuditSink(path.join(dir, "audit.jsonl"));
    const composite = new CompositeAuditSink([new EventBusAuditSink(eventBus), memory, file]);

    await composite.record(record());
    await composite.close();

    expect(memory.records).toEqual([record()]);
    expect(eventBus.ofType("ValidationAuditEvent").map((event) => event.payload)).toEqual([record()]);
    expect(await file.readAll()).toEqual([record()]);
  });

  test("should write the engine's audit log when one is configured", async () => {
    const file = path.join(dir, "engine-audit.jsonl");
    const engine = createValidationEngine({
      config: createEngineConfig({ budgetMs: 60_000, analysisSliceMs: 60_000, auditLogPath: file, logging: { level: "silent" } }),
      logger: getLogger(),
      now: () => new Date("2024-05-01T12:00:00.000Z"),
    });

    const result = await engine.validate("x = 1", "python");
    await engine.close();

    const entries = await new FileAuditSink(file).readAll();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      submissionHash: result.submissionHash,
      isValid: true,
      cacheHit: false,
      timestamp: "2024-05-01T12:00:00.000Z",
    });
    expect(engine.eventBus.ofType("ValidationAuditEvent")).toHaveLength(1);
  });
});
