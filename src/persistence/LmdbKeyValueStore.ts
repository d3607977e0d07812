import { open, type Database, type RootDatabase } from "lmdb";
import path from "path";
import fs from "fs/promises";
import type { KeyValueStore } from "./KeyValueStore";
import { PersistenceError } from "../errors";

export class LmdbKeyValueStore implements KeyValueStore {
  private root: RootDatabase | null = null;
  private db: Database<unknown, string> | null = null;
  private initPromise: Promise<void> | null = null;

  constructor(private readonly storePath: string) {}

  /**
   * Opens the environment once. Concurrent callers share the same promise.
   */
  async initialize(): Promise<void> {
    if (this.root) return;
    if (this.initPromise) return this.initPromise;

    this.initPromise = this.doInitialize();
    try {
      return await this.initPromise;
    } finally {
      this.initPromise = null;
    }
  }

  private async doInitialize(): Promise<void> {
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });

    this.root = open({
      path: this.storePath,
      compression: true,
    });

    this.db = this.root.openDB<unknown, string>({
      name: "preferences",
      encoding: "json",
    });
  }

  get(key: string): unknown {
    return this.requireDb(key).get(key);
  }

  async set(key: string, value: unknown): Promise<void> {
    if (!this.db) await this.initialize();
    await this.requireDb(key).put(key, value);
  }

  async delete(key: string): Promise<void> {
    if (!this.db) await this.initialize();
    await this.requireDb(key).remove(key);
  }

  keys(): string[] {
    if (!this.db) return [];
    return Array.from(this.db.getKeys(), (key) => String(key));
  }

  async close(): Promise<void> {
    if (this.root) {
      await this.root.close();
      this.root = null;
      this.db = null;
    }
  }

  private requireDb(key: string): Database<unknown, string> {
    if (!this.db) {
      throw new PersistenceError(key, "Preferences store is not initialized");
    }
    return this.db;
  }
}

export default LmdbKeyValueStore;
