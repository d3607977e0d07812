export interface KeyValueStore {
  initialize(): Promise<void>;
  /** Reads from the in-memory view. Requires `initialize()` to have resolved. */
  get(key: string): unknown;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): string[];
  close(): Promise<void>;
}

export default KeyValueStore;
