/**
 * File-backed artifact store
 * Layout: <root>/<aa>/<bb>/<key>.json, sharded on the first two byte pairs of the key.
 * Writes go to a temp file first and are renamed into place.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { StorageFailureError } from "../errors";
import { ArtifactStore } from "./artifactStore";

const SAFE_KEY = /^[A-Za-z0-9_-]{4,}$/;

export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly rootDir: string) {}

  async get(key: string): Promise<string | undefined> {
    const filePath = this.pathFor("get", key);
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new StorageFailureError("get", key, error);
    }
  }

  async put(key: string, blob: string): Promise<void> {
    const filePath = this.pathFor("put", key);
    const tmpPath = `${filePath}.tmp-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmpPath, blob, "utf-8");
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new StorageFailureError("put", key, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    const filePath = this.pathFor("exists", key);
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw new StorageFailureError("exists", key, error);
    }
  }

  async delete(key: string): Promise<boolean> {
    const filePath = this.pathFor("delete", key);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw new StorageFailureError("delete", key, error);
    }
  }

  async list(): Promise<string[]> {
    try {
      const keys: string[] = [];
      for (const first of await readDirOrEmpty(this.rootDir)) {
        for (const second of await readDirOrEmpty(path.join(this.rootDir, first))) {
          for (const entry of await readDirOrEmpty(path.join(this.rootDir, first, second))) {
            if (entry.endsWith(".json")) keys.push(entry.slice(0, -".json".length));
          }
        }
      }
      return keys.sort();
    } catch (error) {
      throw new StorageFailureError("list", undefined, error);
    }
  }

  private pathFor(operation: string, key: string): string {
    if (!SAFE_KEY.test(key)) {
      throw new StorageFailureError(operation, key, new Error("key must be at least 4 characters of [A-Za-z0-9_-]"));
    }
    return path.join(this.rootDir, key.slice(0, 2), key.slice(2, 4), `${key}.json`);
  }
}

async function readDirOrEmpty(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (isMissing(error) || isNotDirectory(error)) return [];
    throw error;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}

function isMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isNotDirectory(error: unknown): boolean {
  return errorCode(error) === "ENOTDIR";
}
