import assert from "node:assert/strict";
import express from "express";
import { EventEmitter, once } from "node:events";
import { beforeEach, describe, it } from "node:test";
import { createRequest, createResponse, type RequestMethod } from "node-mocks-http";
import errorHandler from "../middleware/errorHandler";
import { createContainer, type AppContainer } from "../container";
import type { KeyValueStore } from "../persistence/KeyValueStore";
import createPricesRouter from "./prices";
import createProductsRouter from "./products";

class MemoryStore implements KeyValueStore {
  readonly values = new Map<string, unknown>();

  async initialize(): Promise<void> {}

  get(key: string): unknown {
    return this.values.get(key);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.values.set(key, JSON.parse(JSON.stringify(value)));
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  async close(): Promise<void> {}
}

interface RequestOptions {
  method: RequestMethod;
  url: string;
}

describe("/api/prices and /api/products routes", () => {
  let container: AppContainer;
  let testApp: express.Express;
  let exchangeDown: boolean;

  const fakeFetch = async (input: string): Promise<Response> => {
    if (exchangeDown) {
      throw new Error("connect ECONNREFUSED");
    }
    const url = new URL(input);
    const data = url.searchParams.get("instType") === "SPOT"
      ? [
        { instId: "ETH-USDT", last: "2000" },
        { instId: "BTC-EUR", last: "28000" },
        { instId: "BTC-USDT", last: "30000", high24h: "31000", low24h: "29000", open24h: "29500" },
      ]
      : [];
    return new Response(JSON.stringify({ code: "0", msg: "", data }), { status: 200 });
  };

  const invokeApp = async ({ method, url }: RequestOptions) => {
    const req = createRequest({ method, url });
    const res = createResponse({ eventEmitter: EventEmitter });
    const waitForEnd = once(res, "end");
    testApp(req, res);

    req.emit("end");

    await waitForEnd;
    return res;
  };

  beforeEach(async () => {
    exchangeDown = false;
    container = createContainer({
      store: new MemoryStore(),
      fetch: fakeFetch,
      config: { defaultWatchlist: ["BTC-USDT", "ETH-USDT"] },
    });
    await container.watchlist.load();
    container.catalog.applyPrice("BTC-USDT", 30000);
    container.catalog.applyPrice("ETH-USDT", 2000);

    testApp = express();
    testApp.use("/api/prices", createPricesRouter(container));
    testApp.use("/api/products", createProductsRouter(container));
    testApp.use(errorHandler);
  });

  it("returns the snapshot in watchlist order", async () => {
    await container.watchlist.reorder(["ETH-USDT", "BTC-USDT"]);

    const res = await invokeApp({ method: "GET", url: "/api/prices" });

    assert.equal(res.statusCode, 200);
    const payload: { currency: string; data: Array<{ id: string; currentPrice: number }> } = res._getJSONData();
    assert.equal(payload.currency, "USD");
    assert.deepEqual(payload.data.map((item) => [item.id, item.currentPrice]), [["ETH-USDT", 2000], ["BTC-USDT", 30000]]);
  });

  it("converts prices to CNY on request", async () => {
    const res = await invokeApp({ method: "GET", url: "/api/prices/btc-usdt?currency=cny" });

    assert.equal(res.statusCode, 200);
    const payload: { currency: string; data: { currentPrice: number; currency: string } } = res._getJSONData();
    assert.equal(payload.currency, "CNY");
    assert.equal(payload.data.currentPrice, 30000 * 7.16);
  });

  it("rejects unsupported currencies", async () => {
    const res = await invokeApp({ method: "GET", url: "/api/prices?currency=EUR" });

    assert.equal(res.statusCode, 400);
    assert.equal(res._getJSONData().error, "ValidationError");
  });

  it("returns 404 for unknown instruments", async () => {
    const res = await invokeApp({ method: "GET", url: "/api/prices/DOGE-USDT" });

    assert.equal(res.statusCode, 404);
  });

  it("lists dollar-quoted products sorted by base currency", async () => {
    const res = await invokeApp({ method: "GET", url: "/api/products" });

    assert.equal(res.statusCode, 200);
    const payload: { type: string; stale: boolean; data: Array<{ id: string; high24h: number }> } = res._getJSONData();
    assert.equal(payload.type, "spot");
    assert.equal(payload.stale, false);
    assert.deepEqual(payload.data.map((item) => item.id), ["BTC-USDT", "ETH-USDT"]);
    assert.equal(payload.data[0].high24h, 31000);
  });

  it("serves the last listing when the exchange is unreachable", async () => {
    await invokeApp({ method: "GET", url: "/api/products?type=spot" });
    exchangeDown = true;

    const res = await invokeApp({ method: "GET", url: "/api/products?type=spot" });

    assert.equal(res.statusCode, 200);
    assert.equal(res._getJSONData().stale, true);
  });

  it("fails with 502 when there is nothing to fall back on", async () => {
    exchangeDown = true;

    const res = await invokeApp({ method: "GET", url: "/api/products?type=perpetual" });

    assert.equal(res.statusCode, 502);
    assert.equal(res._getJSONData().message, "Product listing is unavailable");
  });
});
