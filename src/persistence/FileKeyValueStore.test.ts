import assert from "node:assert/strict";
import { describe, it, beforeEach, afterEach } from "node:test";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";
import { FileKeyValueStore } from "./FileKeyValueStore";
import { PersistenceError } from "../errors";

describe("FileKeyValueStore", () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "kv-file-test-"));
    filePath = path.join(testDir, "nested", "preferences.json");
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("creates an empty document on first run", async () => {
    const store = new FileKeyValueStore(filePath);
    await store.initialize();

    const payload = JSON.parse(await fs.readFile(filePath, "utf-8"));
    assert.deepEqual(payload, { version: 1, entries: {} });
    assert.deepEqual(store.keys(), []);
  });

  it("persists values across instances", async () => {
    const first = new FileKeyValueStore(filePath);
    await first.initialize();
    await first.set("watchlist", [{ id: "BTC-USDT" }]);
    await first.set("refreshIntervalSeconds", 30);
    await first.close();

    const second = new FileKeyValueStore(filePath);
    await second.initialize();
    assert.deepEqual(second.get("watchlist"), [{ id: "BTC-USDT" }]);
    assert.equal(second.get("refreshIntervalSeconds"), 30);
  });

  it("keeps the last write when writes overlap", async () => {
    const store = new FileKeyValueStore(filePath);
    await store.initialize();

    await Promise.all([store.set("counter", 1), store.set("counter", 2), store.set("counter", 3)]);

    const payload = JSON.parse(await fs.readFile(filePath, "utf-8"));
    assert.equal(payload.entries.counter, 3);
  });

  it("does not hand out live references", async () => {
    const store = new FileKeyValueStore(filePath);
    await store.initialize();
    const value = { ids: ["BTC-USDT"] };
    await store.set("doc", value);
    value.ids.push("ETH-USDT");

    assert.deepEqual(store.get("doc"), { ids: ["BTC-USDT"] });
  });

  it("deletes keys, including through an undefined value", async () => {
    const store = new FileKeyValueStore(filePath);
    await store.initialize();
    await store.set("a", 1);
    await store.set("b", 2);

    await store.delete("a");
    await store.set("b", undefined);

    assert.deepEqual(store.keys(), []);
  });

  it("starts empty when the file is corrupt", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{not json", "utf-8");

    const store = new FileKeyValueStore(filePath);
    await store.initialize();

    assert.equal(store.get("watchlist"), undefined);
  });

  it("refuses reads before initialization", () => {
    const store = new FileKeyValueStore(filePath);
    assert.throws(() => store.get("watchlist"), PersistenceError);
  });
});
