import { promises as fs } from "node:fs";
import path from "node:path";
import type { KeyValueStore } from "./KeyValueStore";
import { PersistenceError } from "../errors";
import logger from "../utils/logger";

interface StoreDocument {
  version: number;
  entries: Record<string, unknown>;
}

const CURRENT_VERSION = 1;

const ensureDirectory = async (filePath: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseDocument = (payload: string): StoreDocument | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || !isRecord(parsed.entries)) {
    return null;
  }

  return {
    version: typeof parsed.version === "number" ? parsed.version : 0,
    entries: { ...parsed.entries },
  };
};

/**
 * Keeps every preference in one JSON document. Writes are serialized on a
 * single promise tail, so the file always reflects the last completed `set`.
 */
export class FileKeyValueStore implements KeyValueStore {
  private document: StoreDocument | null = null;

  private writeTail: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async initialize(): Promise<void> {
    if (this.document) {
      return;
    }

    await ensureDirectory(this.filePath);

    try {
      const payload = await fs.readFile(this.filePath, "utf-8");
      const parsed = parseDocument(payload);
      if (parsed) {
        this.document = { ...parsed, version: CURRENT_VERSION };
        return;
      }
      logger.warn({ filePath: this.filePath }, "Preferences file is unreadable, starting empty");
    } catch (error) {
      if (!(error instanceof Error) || !("code" in error) || error.code !== "ENOENT") {
        throw new PersistenceError("*", `Failed to read ${this.filePath}`, error);
      }
    }

    this.document = { version: CURRENT_VERSION, entries: {} };
    await this.persist();
  }

  get(key: string): unknown {
    return this.requireDocument(key).entries[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    if (value === undefined) {
      await this.delete(key);
      return;
    }
    if (!this.document) await this.initialize();
    // Stored as plain JSON so reads never hand out live references.
    this.requireDocument(key).entries[key] = JSON.parse(JSON.stringify(value));
    await this.persist();
  }

  async delete(key: string): Promise<void> {
    if (!this.document) await this.initialize();
    delete this.requireDocument(key).entries[key];
    await this.persist();
  }

  keys(): string[] {
    return this.document ? Object.keys(this.document.entries) : [];
  }

  async close(): Promise<void> {
    await this.writeTail;
  }

  private requireDocument(key: string): StoreDocument {
    if (!this.document) {
      throw new PersistenceError(key, "Preferences store is not initialized");
    }
    return this.document;
  }

  private async persist(): Promise<void> {
    const payload = JSON.stringify(this.requireDocument("*"), null, 2);
    const write = this.writeTail.then(async () => {
      await ensureDirectory(this.filePath);
      await fs.writeFile(this.filePath, payload, "utf-8");
    });
    // A failed write must not poison the writes queued after it.
    this.writeTail = write.catch((error: unknown) => {
      logger.error({ err: error, filePath: this.filePath }, "Preferences write failed");
    });
    await write;
  }
}

export default FileKeyValueStore;
