/**
 * Durable blob store behind the validation cache
 */

export interface ArtifactStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, blob: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Resolves true when something was removed */
  delete(key: string): Promise<boolean>;
  list(): Promise<string[]>;
}

export class InMemoryArtifactStore implements ArtifactStore {
  private readonly blobs = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.blobs.get(key);
  }

  async put(key: string, blob: string): Promise<void> {
    this.blobs.set(key, blob);
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.blobs.delete(key);
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()].sort();
  }

  get size(): number {
    return this.blobs.size;
  }
}
