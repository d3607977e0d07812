import assert from "node:assert/strict";
import { describe, it, beforeEach, afterEach, mock } from "node:test";
import { SubscriptionManager, type SubscriptionTransport, type WatchlistView } from "./SubscriptionManager";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

class FakeTransport implements SubscriptionTransport {
  connected = true;
  sent: string[] = [];
  failFor = new Set<string>();
  private held: Array<() => void> = [];
  holdRequests = false;

  isConnected(): boolean {
    return this.connected;
  }

  send(payload: unknown): Promise<void> {
    const message = JSON.parse(JSON.stringify(payload));
    const entry = `${message.op}:${message.args[0].instId}`;
    this.sent.push(entry);
    if (this.failFor.has(entry)) {
      return Promise.reject(new Error("socket closed"));
    }
    if (this.holdRequests) {
      return new Promise<void>((resolve) => this.held.push(resolve));
    }
    return Promise.resolve();
  }

  releaseOne(): void {
    this.held.shift()?.();
  }
}

class FakeWatchlist implements WatchlistView {
  constructor(public ids: string[] = []) {}

  has(id: string): boolean {
    return this.ids.includes(id);
  }

  getIds(): string[] {
    return [...this.ids];
  }
}

describe("SubscriptionManager", () => {
  let transport: FakeTransport;
  let watchlist: FakeWatchlist;
  let manager: SubscriptionManager;

  beforeEach(() => {
    mock.timers.enable({ apis: ["setTimeout", "setInterval"] });
    transport = new FakeTransport();
    watchlist = new FakeWatchlist();
    manager = new SubscriptionManager({ connection: transport, watchlist });
  });

  afterEach(() => {
    manager.reset();
    mock.timers.reset();
  });

  it("subscribes five immediately and the rest after the batch delay", async () => {
    watchlist.ids = ["A-USDT", "B-USDT", "C-USDT", "D-USDT", "E-USDT", "F-USDT", "G-USDT", "H-USDT"];

    await manager.reconcile(watchlist.getIds(), "connected");
    assert.deepEqual(transport.sent, [
      "subscribe:A-USDT",
      "subscribe:B-USDT",
      "subscribe:C-USDT",
      "subscribe:D-USDT",
      "subscribe:E-USDT",
    ]);

    mock.timers.tick(1999);
    assert.equal(transport.sent.length, 5);
    mock.timers.tick(1);
    assert.equal(transport.sent[5], "subscribe:F-USDT");
    mock.timers.tick(199);
    assert.equal(transport.sent.length, 6);
    mock.timers.tick(1);
    mock.timers.tick(200);
    await flush();

    assert.deepEqual(transport.sent.slice(5), ["subscribe:F-USDT", "subscribe:G-USDT", "subscribe:H-USDT"]);
    assert.deepEqual(manager.getSubscriptions().sort(), [...watchlist.ids].sort());
  });

  it("sends one request for a repeated subscribe", async () => {
    await Promise.all([manager.subscribe("BTC-USDT"), manager.subscribe("BTC-USDT")]);

    assert.deepEqual(transport.sent, ["subscribe:BTC-USDT"]);
  });

  it("never unsubscribes a watched instrument", async () => {
    watchlist.ids = ["BTC-USDT"];
    await manager.subscribe("BTC-USDT");

    assert.equal(await manager.unsubscribe("BTC-USDT"), false);
    assert.equal(manager.isSubscribed("BTC-USDT"), true);
    assert.deepEqual(transport.sent, ["subscribe:BTC-USDT"]);
  });

  it("ignores unsubscribe for an instrument it does not hold", async () => {
    assert.equal(await manager.unsubscribe("BTC-USDT"), false);
    assert.deepEqual(transport.sent, []);
  });

  it("rolls back a subscribe the transport rejected", async () => {
    transport.failFor.add("subscribe:BTC-USDT");

    assert.equal(await manager.subscribe("BTC-USDT"), false);
    assert.equal(manager.isSubscribed("BTC-USDT"), false);
  });

  it("records without sending while disconnected", async () => {
    transport.connected = false;
    watchlist.ids = ["BTC-USDT", "ETH-USDT"];

    await manager.reconcile(watchlist.getIds(), "disconnected");

    assert.deepEqual(transport.sent, []);
    assert.deepEqual(manager.getSubscriptions(), ["BTC-USDT", "ETH-USDT"]);
  });

  it("tears everything down when the watchlist empties", async () => {
    watchlist.ids = ["A-USDT", "B-USDT", "C-USDT", "D-USDT", "E-USDT", "F-USDT", "G-USDT"];
    await manager.reconcile(watchlist.getIds(), "connected");

    watchlist.ids = [];
    await manager.reconcile([], "connected");
    mock.timers.tick(5000);

    assert.deepEqual(manager.getSubscriptions(), []);
    assert.deepEqual(manager.getPendingBatch(), []);
    assert.deepEqual(transport.sent.filter((entry) => entry.startsWith("unsubscribe:")), [
      "unsubscribe:A-USDT",
      "unsubscribe:B-USDT",
      "unsubscribe:C-USDT",
      "unsubscribe:D-USDT",
      "unsubscribe:E-USDT",
    ]);
    assert.equal(transport.sent.length, 10);
  });

  it("keeps requests for one instrument strictly sequential", async () => {
    transport.holdRequests = true;

    const subscribed = manager.subscribe("BTC-USDT");
    const unsubscribed = manager.unsubscribe("BTC-USDT");
    await flush();
    assert.deepEqual(transport.sent, ["subscribe:BTC-USDT"]);

    transport.releaseOne();
    await flush();
    assert.deepEqual(transport.sent, ["subscribe:BTC-USDT", "unsubscribe:BTC-USDT"]);

    transport.releaseOne();
    assert.equal(await subscribed, true);
    assert.equal(await unsubscribed, true);
  });

  it("re-subscribes the whole watchlist on restore", async () => {
    watchlist.ids = ["BTC-USDT", "ETH-USDT"];
    await manager.reconcile(watchlist.getIds(), "connected");
    transport.sent = [];

    await manager.restore();

    assert.deepEqual(transport.sent, ["subscribe:BTC-USDT", "subscribe:ETH-USDT"]);
  });

  it("converges on the watchlist after a run of edits", async () => {
    const universe = ["A-USDT", "B-USDT", "C-USDT", "D-USDT", "E-USDT", "F-USDT", "G-USDT", "H-USDT", "I-USDT"];
    const edits: Array<["add" | "remove", string]> = [
      ["add", "A-USDT"], ["add", "B-USDT"], ["add", "C-USDT"], ["remove", "B-USDT"],
      ["add", "D-USDT"], ["add", "E-USDT"], ["add", "F-USDT"], ["add", "G-USDT"],
      ["add", "H-USDT"], ["remove", "A-USDT"], ["add", "I-USDT"], ["add", "B-USDT"],
      ["remove", "G-USDT"],
    ];

    for (const [op, id] of edits) {
      if (op === "add") {
        watchlist.ids.push(id);
        await manager.subscribe(id);
      } else {
        watchlist.ids = watchlist.ids.filter((entry) => entry !== id);
        await manager.unsubscribe(id);
      }
      await manager.reconcile(watchlist.getIds(), "connected");
    }

    mock.timers.tick(10000);
    await flush();

    assert.deepEqual(manager.getSubscriptions().sort(), [...watchlist.ids].sort());
    assert.ok(manager.getSubscriptions().every((id) => universe.includes(id)));
  });
});
