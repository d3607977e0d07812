import assert from "node:assert/strict";
import { describe, it, beforeEach, afterEach, mock } from "node:test";
import { ExchangeRateService, DEFAULT_USD_CNY_RATE, RATE_REFRESH_INTERVAL_MS } from "./ExchangeRateService";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

class FakeClient {
  rate = 7.25;
  calls = 0;
  failing = false;

  async fetchUsdCnyRate(): Promise<number> {
    this.calls++;
    if (this.failing) throw new Error("unreachable");
    return this.rate;
  }
}

class FakeRepository {
  cached: { rate: number; fetchedAt: Date } | null = null;
  saved: Array<{ rate: number; fetchedAt: Date }> = [];

  loadExchangeRate(): { rate: number; fetchedAt: Date } | null {
    return this.cached;
  }

  async saveExchangeRate(rate: number, fetchedAt: Date): Promise<void> {
    this.saved.push({ rate, fetchedAt });
  }
}

describe("ExchangeRateService", () => {
  const now = new Date("2024-05-01T12:00:00.000Z");
  let client: FakeClient;
  let repository: FakeRepository;
  let service: ExchangeRateService;

  beforeEach(() => {
    mock.timers.enable({ apis: ["setInterval"] });
    client = new FakeClient();
    repository = new FakeRepository();
    service = new ExchangeRateService({ client, repository, now: () => now });
  });

  afterEach(() => {
    service.stop();
    mock.timers.reset();
  });

  it("falls back to the default rate", () => {
    assert.equal(service.getRate(), DEFAULT_USD_CNY_RATE);
    assert.equal(service.isFresh(), false);
  });

  it("uses a cached rate younger than an hour without fetching", async () => {
    repository.cached = { rate: 7.1, fetchedAt: new Date(now.getTime() - 30 * 60 * 1000) };

    await service.start();

    assert.equal(service.getRate(), 7.1);
    assert.equal(client.calls, 0);
  });

  it("fetches and saves when the cached rate is stale", async () => {
    repository.cached = { rate: 7.1, fetchedAt: new Date(now.getTime() - 60 * 60 * 1000) };

    await service.start();

    assert.equal(service.getRate(), 7.25);
    assert.deepEqual(repository.saved, [{ rate: 7.25, fetchedAt: now }]);
  });

  it("keeps the previous rate when a refresh fails", async () => {
    client.failing = true;

    assert.equal(await service.refresh(), DEFAULT_USD_CNY_RATE);
    assert.deepEqual(repository.saved, []);
  });

  it("refreshes on the interval", async () => {
    await service.start();
    assert.equal(client.calls, 1);

    client.rate = 7.3;
    mock.timers.tick(RATE_REFRESH_INTERVAL_MS);
    await flush();

    assert.equal(client.calls, 2);
    assert.equal(service.getRate(), 7.3);
  });

  it("converts only into CNY", async () => {
    await service.start();

    assert.equal(service.convert(10, "USD"), 10);
    assert.equal(service.convert(10, "CNY"), 72.5);
  });
});
