/**
 * Artifact stores, codec and submission hashing
 */

import fs from "fs";
import os from "os";
import path from "path";
import { emptyFacts } from "../src/core/analysis/findings";
import { decodeArtifact, encodeArtifact } from "../src/core/cache/artifactCodec";
import { buildArtifact, collectDependencies, withValidationResult } from "../src/core/cache/artifacts";
import { InMemoryArtifactStore } from "../src/core/cache/artifactStore";
import { FileArtifactStore } from "../src/core/cache/fileArtifactStore";
import { computeSubmissionHash, isSubmissionHash, normalizeSource } from "../src/core/cache/hashing";
import { StorageFailureError } from "../src/core/errors";
import { SAMPLE_HASH, sampleArtifact, sampleResult } from "./helpers";

describe("Submission hashing", () => {
  test("should ignore surrounding whitespace", () => {
    expect(normalizeSource("\n  x = 1  \n")).toBe("x = 1");
    expect(computeSubmissionHash("x = 1", "python")).toBe(computeSubmissionHash("  x = 1\n\n", "python"));
  });

  test("should key by language as well as source", () => {
    const hash = computeSubmissionHash("x = 1", "python");
    expect(isSubmissionHash(hash)).toBe(true);
    expect(hash).not.toBe(computeSubmissionHash("x = 1", "javascript"));
  });

  test("should keep inner whitespace significant", () => {
    expect(computeSubmissionHash("x = 1", "python")).not.toBe(computeSubmissionHash("x =  1", "python"));
  });

  test("should recognise only lowercase sha-256 digests", () => {
    expect(isSubmissionHash("ab".repeat(32))).toBe(true);
    expect(isSubmissionHash("AB".repeat(32))).toBe(false);
    expect(isSubmissionHash("abc")).toBe(false);
  });
});

describe("Artifacts", () => {
  test("should build an artifact from a verdict", () => {
    expect(sampleArtifact()).toEqual({
      submissionHash: SAMPLE_HASH,
      language: "python",
      validatedCode: "x = 1",
      validationResult: sampleResult(),
      dependencies: [],
      executionMetadata: {
        estimatedMemoryBytes: 69_206_016,
        estimatedCpuMs: 250,
        timeoutSeconds: 30,
        requiresNetwork: false,
        requiresFilesystem: false,
      },
      usageCount: 0,
      createdAt: "2024-05-01T12:00:00.000Z",
      status: "validated",
      references: [],
    });
    expect(sampleArtifact(SAMPLE_HASH, { isValid: false, outcome: "rejected" }).status).toBe("rejected");
  });

  test("should collect top-level dependencies", () => {
    const facts = {
      ...emptyFacts(),
      imports: [
        { module: "os.path", line: 1, dynamic: false, relative: false },
        { module: "json", line: 2, dynamic: false, relative: false },
        { module: "os", line: 3, dynamic: false, relative: false },
        { module: "@scope/pkg/sub", line: 4, dynamic: false, relative: false },
        { module: ".helpers", line: 5, dynamic: false, relative: true },
      ],
    };
    expect(collectDependencies(facts)).toEqual(["@scope/pkg", "json", "os"]);
  });

  test("should carry analysis facts into the execution metadata", () => {
    const analysis = {
      language: "python" as const,
      confidence: "best-effort" as const,
      syntaxErrors: [],
      warnings: [],
      securityIssues: [],
      facts: {
        ...emptyFacts(1),
        imports: [{ module: "requests", line: 1, dynamic: false, relative: false }],
        usesNetwork: true,
      },
    };
    const artifact = buildArtifact({
      submissionHash: SAMPLE_HASH,
      language: "python",
      code: "import requests",
      result: sampleResult(),
      analysis,
      timeoutSeconds: 10,
      createdAt: "2024-05-01T12:00:00.000Z",
    });

    expect(artifact.dependencies).toEqual(["requests"]);
    expect(artifact.executionMetadata.requiresNetwork).toBe(true);
    expect(artifact.executionMetadata.timeoutSeconds).toBe(10);
    expect(artifact.analysis).toBe(analysis);
  });

  test("should swap the verdict and keep counters and references", () => {
    const original = { ...sampleArtifact(), usageCount: 4, references: ["tool-a"] };
    const rejected = sampleResult({
      isValid: false,
      outcome: "rejected",
      policyVersionEvaluated: "strict@2",
      resourceEstimate: null,
    });

    const next = withValidationResult(original, rejected);

    expect(next.validationResult).toBe(rejected);
    expect(next.status).toBe("rejected");
    expect(next.usageCount).toBe(4);
    expect(next.references).toEqual(["tool-a"]);
    expect(next.executionMetadata).toEqual(original.executionMetadata);
  });
});

describe("Artifact codec", () => {
  test("should decode what it encodes", () => {
    const artifact = sampleArtifact();
    expect(decodeArtifact(encodeArtifact(artifact), SAMPLE_HASH)).toEqual(artifact);
  });

  test("should report malformed JSON as a storage failure", () => {
    expect(() => decodeArtifact("{", SAMPLE_HASH)).toThrow(StorageFailureError);
  });

  test("should report blobs that do not match the schema", () => {
    const blob = JSON.stringify({ ...sampleArtifact(), usageCount: -1 });

    let caught: unknown;
    try {
      decodeArtifact(blob, SAMPLE_HASH);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StorageFailureError);
    if (caught instanceof StorageFailureError) {
      expect(caught.operation).toBe("decode");
      expect(caught.key).toBe(SAMPLE_HASH);
      expect(caught.message).toContain("usageCount: ");
    }
  });
});

describe("InMemoryArtifactStore", () => {
  test("should store, list and delete blobs", async () => {
    const store = new InMemoryArtifactStore();
    await store.put("bbbb", "2");
    await store.put("aaaa", "1");

    expect(await store.get("aaaa")).toBe("1");
    expect(await store.exists("bbbb")).toBe(true);
    expect(await store.list()).toEqual(["aaaa", "bbbb"]);
    expect(await store.delete("aaaa")).toBe(true);
    expect(await store.delete("aaaa")).toBe(false);
    expect(await store.get("aaaa")).toBeUndefined();
    expect(store.size).toBe(1);
  });
});

describe("FileArtifactStore", () => {
  let dir: string;
  let store: FileArtifactStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "codegate-store-"));
    store = new FileArtifactStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("should shard blobs by key prefix", async () => {
    await store.put(SAMPLE_HASH, "blob");

    expect(fs.readFileSync(path.join(dir, "ab", "ab", `${SAMPLE_HASH}.json`), "utf-8")).toBe("blob");
    expect(await store.get(SAMPLE_HASH)).toBe("blob");
    expect(await store.exists(SAMPLE_HASH)).toBe(true);
  });

  test("should overwrite without leaving temp files", async () => {
    await store.put(SAMPLE_HASH, "first");
    await store.put(SAMPLE_HASH, "second");

    expect(await store.get(SAMPLE_HASH)).toBe("second");
    expect(fs.readdirSync(path.join(dir, "ab", "ab"))).toEqual([`${SAMPLE_HASH}.json`]);
  });

  test("should treat missing keys as absent", async () => {
    expect(await store.get("cdcdcdcd")).toBeUndefined();
    expect(await store.exists("cdcdcdcd")).toBe(false);
    expect(await store.delete("cdcdcdcd")).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  test("should list every stored key in order", async () => {
    await store.put("ffff0001", "b");
    await store.put("0000ffff", "a");
    await store.put("ffff0000", "c");

    expect(await store.list()).toEqual(["0000ffff", "ffff0000", "ffff0001"]);
    expect(await store.delete("ffff0000")).toBe(true);
    expect(await store.list()).toEqual(["0000ffff", "ffff0001"]);
  });

  test("should refuse keys that could escape the root", async () => {
    await expect(store.get("../../etc/passwd")).rejects.toThrow(StorageFailureError);
    await expect(store.put("ab", "x")).rejects.toThrow(
      "Storage failure during put (ab): key must be at least 4 characters of [A-Za-z0-9_-]"
    );
  });
});
