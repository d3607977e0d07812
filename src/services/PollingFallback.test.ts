import assert from "node:assert/strict";
import { describe, it, beforeEach, afterEach, mock } from "node:test";
import { PollingFallback, clampRefreshInterval } from "./PollingFallback";
import { ProductCatalog, createInstrument } from "./ProductCatalog";
import { UpdateReconciler } from "./UpdateReconciler";
import type { TickerEntry } from "../schemas/ticker";
import type { Instrument, InstrumentType, MarketState } from "../types";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

class FakeClient {
  bulk = new Map<InstrumentType, TickerEntry[]>();
  single = new Map<string, TickerEntry>();
  failingTypes = new Set<InstrumentType>();
  calls: string[] = [];

  async fetchTickers(type: InstrumentType): Promise<TickerEntry[]> {
    this.calls.push(`bulk:${type}`);
    if (this.failingTypes.has(type)) throw new Error("timeout");
    return this.bulk.get(type) ?? [];
  }

  async fetchTicker(id: string): Promise<TickerEntry | null> {
    this.calls.push(`single:${id}`);
    return this.single.get(id) ?? null;
  }
}

class FakeConnection {
  connected = false;
  ensureCalls = 0;

  isConnected(): boolean {
    return this.connected;
  }

  ensureConnected(): boolean {
    this.ensureCalls++;
    return true;
  }
}

class FakeRepository {
  savedCaches: Array<Map<string, MarketState>> = [];
  savedIntervals: number[] = [];

  async savePriceCache(states: Map<string, MarketState>): Promise<void> {
    this.savedCaches.push(states);
  }

  async setRefreshIntervalSeconds(seconds: number): Promise<void> {
    this.savedIntervals.push(seconds);
  }
}

describe("clampRefreshInterval", () => {
  it("keeps the interval within ten seconds and five minutes", () => {
    assert.equal(clampRefreshInterval(5), 10);
    assert.equal(clampRefreshInterval(45), 45);
    assert.equal(clampRefreshInterval(900), 300);
    assert.equal(clampRefreshInterval(Number.NaN), 60);
  });
});

describe("PollingFallback", () => {
  let client: FakeClient;
  let connection: FakeConnection;
  let repository: FakeRepository;
  let catalog: ProductCatalog;
  let reconciler: UpdateReconciler;
  let instruments: Instrument[];
  let polling: PollingFallback;

  beforeEach(() => {
    mock.timers.enable({ apis: ["setTimeout", "setInterval"] });
    client = new FakeClient();
    connection = new FakeConnection();
    repository = new FakeRepository();
    catalog = new ProductCatalog();
    instruments = ["BTC-USDT", "ETH-USDT", "BTC-USDT-SWAP"].map((id) => createInstrument(id));
    instruments.forEach((instrument) => catalog.ensure(instrument));
    reconciler = new UpdateReconciler({
      catalog,
      subscriptions: { isSubscribed: () => true },
      watchlist: { has: () => true },
      getDisplayedInstrumentId: () => null,
      getAlertSettings: () => ({ notifyOnSignificantChanges: false, significantChangeThreshold: 5, priceChangeMode: "hours24" }),
    });
    polling = new PollingFallback({
      client,
      reconciler,
      catalog,
      watchlist: { getInstruments: () => instruments },
      connection,
      repository,
    });
  });

  afterEach(() => {
    polling.stop();
    reconciler.dispose();
    mock.timers.reset();
  });

  it("fetches once per instrument type in the watchlist", async () => {
    client.bulk.set("spot", [
      { instId: "BTC-USDT", last: 30000 },
      { instId: "ETH-USDT", last: 2000 },
      { instId: "XRP-USDT", last: 0.5 },
    ]);
    client.bulk.set("perpetual", [{ instId: "BTC-USDT-SWAP", last: 30010 }]);

    const result = await polling.poll();

    assert.deepEqual(client.calls, ["bulk:spot", "bulk:perpetual"]);
    assert.deepEqual(result.types, ["spot", "perpetual"]);
    assert.deepEqual(result.updated, ["BTC-USDT", "ETH-USDT", "BTC-USDT-SWAP"]);
    assert.equal(catalog.get("BTC-USDT-SWAP")?.currentPrice, 30010);
    assert.equal(catalog.has("XRP-USDT"), false);
  });

  it("looks up instruments the bulk answer left out", async () => {
    client.failingTypes.add("perpetual");
    client.bulk.set("spot", [{ instId: "BTC-USDT", last: 30000 }]);
    client.single.set("ETH-USDT", { instId: "ETH-USDT", last: 2000 });

    const result = await polling.poll();

    assert.deepEqual(client.calls, ["bulk:spot", "bulk:perpetual", "single:ETH-USDT", "single:BTC-USDT-SWAP"]);
    assert.deepEqual(result.missing, ["BTC-USDT-SWAP"]);
    assert.equal(catalog.get("ETH-USDT")?.currentPrice, 2000);
  });

  it("uses the same acceptance rule as the stream", async () => {
    catalog.applyPrice("BTC-USDT", 30000);
    client.bulk.set("spot", [{ instId: "BTC-USDT", last: 30000.0000001 }]);

    const result = await polling.poll();

    assert.deepEqual(result.updated, []);
    assert.equal(catalog.get("BTC-USDT")?.previousPrice, 0);
  });

  it("saves the price cache before fetching", async () => {
    catalog.applyPrice("BTC-USDT", 30000);

    await polling.poll();

    assert.equal(repository.savedCaches.length, 1);
    assert.equal(repository.savedCaches[0].get("BTC-USDT")?.currentPrice, 30000);
  });

  it("asks the stream to reconnect only while it is down", async () => {
    await polling.poll();
    assert.equal(connection.ensureCalls, 1);

    connection.connected = true;
    await polling.poll();
    assert.equal(connection.ensureCalls, 1);
  });

  it("polls on every interval", async () => {
    polling.start();

    mock.timers.tick(59999);
    await flush();
    assert.equal(repository.savedCaches.length, 0);

    mock.timers.tick(1);
    await flush();
    assert.equal(repository.savedCaches.length, 1);
  });

  it("rearms, saves and polls immediately when the interval changes", async () => {
    polling.start();

    const applied = await polling.setIntervalSeconds(5);

    assert.equal(applied, 10);
    assert.deepEqual(repository.savedIntervals, [10]);
    assert.equal(repository.savedCaches.length, 1);

    mock.timers.tick(10000);
    await flush();
    assert.equal(repository.savedCaches.length, 2);
  });

  it("shares an in-flight poll", async () => {
    const [first, second] = await Promise.all([polling.poll(), polling.poll()]);

    assert.equal(first, second);
    assert.equal(repository.savedCaches.length, 1);
  });
});
