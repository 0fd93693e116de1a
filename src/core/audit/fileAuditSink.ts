/**
 * Append-only JSONL audit log, one record per line
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { AuditRecord } from "../types";
import { AuditSink } from "./auditSink";

const AuditRecordSchema = z.object({
  submissionHash: z.string(),
  language: z.enum(["python", "javascript", "typescript"]),
  isValid: z.boolean(),
  outcome: z.enum(["accepted", "rejected", "syntax_error", "analysis_timeout", "analysis_error", "invalid_submission"]),
  violationCount: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  cacheHit: z.boolean(),
  coalesced: z.boolean(),
  reevaluated: z.boolean(),
  policyVersion: z.string(),
  timestamp: z.string(),
});

export class FileAuditSink implements AuditSink {
  private handle: fs.FileHandle | null = null;
  private opening: Promise<fs.FileHandle> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly logPath: string) {}

  get path(): string {
    return this.logPath;
  }

  /** Appends are serialized so concurrent records never interleave */
  record(entry: AuditRecord): Promise<void> {
    const line = Buffer.from(JSON.stringify(entry) + "\n", "utf-8");
    const write = this.writes.then(async () => {
      const handle = await this.open();
      await handle.write(line);
    });
    // The caller sees a failed write; later records still go out
    this.writes = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Records already on disk; lines that are torn or do not match the record shape are skipped */
  async readAll(): Promise<AuditRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }

    const records: AuditRecord[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      const parsed = AuditRecordSchema.safeParse(parseLine(line));
      if (parsed.success) records.push(parsed.data);
    }
    return records;
  }

  async close(): Promise<void> {
    await this.writes;
    const pending = this.opening;
    this.opening = null;
    this.handle = null;
    if (pending) {
      const handle = await pending;
      await handle.close();
    }
  }

  private async open(): Promise<fs.FileHandle> {
    if (this.handle) return this.handle;
    if (!this.opening) {
      this.opening = fs
        .mkdir(path.dirname(this.logPath), { recursive: true })
        .then(() => fs.open(this.logPath, "a"));
    }
    this.handle = await this.opening;
    return this.handle;
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
