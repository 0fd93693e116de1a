/**
 * Content-addressed validation cache
 * - read-modify-write operations on one key are serialized through a per-key promise chain
 * - concurrent computations for the same in-flight key are coalesced into one
 * - every store failure surfaces as StorageFailureError and a StorageErrorEvent
 */

import { StorageFailureError } from "../errors";
import { EventBus } from "../eventBus";
import { AnalysisOutcome, CachedArtifact, ValidationResult } from "../types";
import { decodeArtifact, encodeArtifact } from "./artifactCodec";
import { withValidationResult } from "./artifacts";
import { ArtifactStore } from "./artifactStore";

export interface CoalescedComputation {
  result: ValidationResult;
  artifact?: CachedArtifact;
}

export interface CoalesceOutcome<T> {
  value: T;
  /** True when this caller joined a computation another caller started */
  joined: boolean;
}

export interface DeleteOutcome {
  deleted: boolean;
  remainingReferences: string[];
}

export interface CacheStats {
  artifacts: number;
  validated: number;
  rejected: number;
  totalUsage: number;
  referenced: number;
  inFlight: number;
}

export class ValidationCache {
  private readonly locks = new Map<string, Promise<void>>();
  private readonly inFlight = new Map<string, Promise<CoalescedComputation>>();

  constructor(
    private readonly store: ArtifactStore,
    private readonly eventBus?: EventBus
  ) {}

  async get(key: string): Promise<CachedArtifact | undefined> {
    return this.read(key);
  }

  async has(key: string): Promise<boolean> {
    return this.guard("exists", key, () => this.store.exists(key));
  }

  async keys(): Promise<string[]> {
    return this.guard("list", undefined, () => this.store.list());
  }

  /**
   * Stores the artifact unless one already exists; resolves to whichever is cached afterwards
   */
  async put(key: string, artifact: CachedArtifact): Promise<CachedArtifact> {
    return this.withLock(key, async () => {
      const existing = await this.read(key);
      if (existing) return existing;
      await this.write(key, artifact);
      return artifact;
    });
  }

  /** Increments the usage count of a cached artifact */
  async touch(key: string): Promise<CachedArtifact | undefined> {
    return this.update(key, (artifact) => ({ ...artifact, usageCount: artifact.usageCount + 1 }));
  }

  async replaceResult(
    key: string,
    result: ValidationResult,
    analysis?: AnalysisOutcome
  ): Promise<CachedArtifact | undefined> {
    return this.update(key, (artifact) => withValidationResult(artifact, result, analysis));
  }

  async addReference(key: string, reference: string): Promise<CachedArtifact | undefined> {
    return this.update(key, (artifact) =>
      artifact.references.includes(reference)
        ? artifact
        : { ...artifact, references: [...artifact.references, reference].sort() }
    );
  }

  async releaseReference(key: string, reference: string): Promise<CachedArtifact | undefined> {
    return this.update(key, (artifact) =>
      artifact.references.includes(reference)
        ? { ...artifact, references: artifact.references.filter((r) => r !== reference) }
        : artifact
    );
  }

  /**
   * Removes the artifact once nothing references it. A caller that holds a reference
   * passes it as releasingReference; it is released even when others keep the artifact alive.
   */
  async delete(key: string, releasingReference?: string): Promise<DeleteOutcome> {
    return this.withLock(key, async () => {
      const existing = await this.read(key);
      if (!existing) return { deleted: false, remainingReferences: [] };

      const remaining = existing.references.filter((r) => r !== releasingReference);
      if (remaining.length > 0) {
        if (remaining.length !== existing.references.length) {
          await this.write(key, { ...existing, references: remaining });
        }
        return { deleted: false, remainingReferences: remaining };
      }

      const deleted = await this.guard("delete", key, () => this.store.delete(key));
      if (deleted) {
        this.eventBus?.emit("ArtifactDeletedEvent", {
          submissionHash: key,
          ...(releasingReference !== undefined ? { releasedReference: releasingReference } : {}),
        });
      }
      return { deleted, remainingReferences: [] };
    });
  }

  /**
   * Runs compute once per in-flight key; callers arriving meanwhile share its outcome
   */
  async coalesce(
    flightKey: string,
    compute: () => Promise<CoalescedComputation>
  ): Promise<CoalesceOutcome<CoalescedComputation>> {
    const pending = this.inFlight.get(flightKey);
    if (pending) {
      return { value: await pending, joined: true };
    }

    const flight: Promise<CoalescedComputation> = compute().finally(() => {
      if (this.inFlight.get(flightKey) === flight) this.inFlight.delete(flightKey);
    });
    this.inFlight.set(flightKey, flight);
    return { value: await flight, joined: false };
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = {
      artifacts: 0,
      validated: 0,
      rejected: 0,
      totalUsage: 0,
      referenced: 0,
      inFlight: this.inFlight.size,
    };

    for (const key of await this.keys()) {
      const artifact = await this.read(key);
      if (!artifact) continue;
      stats.artifacts++;
      stats.totalUsage += artifact.usageCount;
      if (artifact.status === "validated") stats.validated++;
      else stats.rejected++;
      if (artifact.references.length > 0) stats.referenced++;
    }
    return stats;
  }

  private async update(
    key: string,
    change: (artifact: CachedArtifact) => CachedArtifact
  ): Promise<CachedArtifact | undefined> {
    return this.withLock(key, async () => {
      const existing = await this.read(key);
      if (!existing) return undefined;
      const next = change(existing);
      if (next !== existing) await this.write(key, next);
      return next;
    });
  }

  private async read(key: string): Promise<CachedArtifact | undefined> {
    return this.guard("get", key, async () => {
      const blob = await this.store.get(key);
      return blob === undefined ? undefined : decodeArtifact(blob, key);
    });
  }

  private async write(key: string, artifact: CachedArtifact): Promise<void> {
    await this.guard("put", key, () => this.store.put(key, encodeArtifact(artifact)));
  }

  private async guard<T>(operation: string, key: string | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const failure = error instanceof StorageFailureError ? error : new StorageFailureError(operation, key, error);
      this.eventBus?.emit("StorageErrorEvent", {
        operation: failure.operation,
        ...(failure.key !== undefined ? { key: failure.key } : {}),
        message: failure.message,
      });
      throw failure;
    }
  }

  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const next = previous.then(fn);
    // The tail only orders the queue; failures reach the caller through next
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await next;
    } finally {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    }
  }
}
