import assert from "node:assert/strict";
import { describe, it } from "node:test";
import env from "./env";
import { validateEnvironment } from "./validateEnv";

describe("validateEnvironment", () => {
  const base = {
    ...env,
    exchangeWsUrl: "wss://stream.test/ws",
    exchangeRestUrl: "https://rest.test",
    refreshIntervalSeconds: 60,
    defaultWatchlist: ["BTC-USDT", "ETH-USDT-SWAP"],
    notificationsEnabled: false,
  };

  it("accepts a complete configuration", () => {
    assert.deepEqual(validateEnvironment(base), { valid: true, warnings: [], errors: [] });
  });

  it("reports URLs with the wrong scheme as errors", () => {
    const report = validateEnvironment({ ...base, exchangeWsUrl: "https://stream.test/ws", exchangeRestUrl: "ftp://rest.test" });

    assert.equal(report.valid, false);
    assert.deepEqual(report.errors, [
      "EXCHANGE_WS_URL 'https://stream.test/ws' is not a ws:// or wss:// URL.",
      "EXCHANGE_REST_URL 'ftp://rest.test' is not an http(s) URL.",
    ]);
  });

  it("warns about values that will be adjusted", () => {
    const report = validateEnvironment({
      ...base,
      refreshIntervalSeconds: 5,
      defaultWatchlist: ["BTC-USDT", "BTCUSDT"],
      notificationsEnabled: true,
      discordWebhookUrl: "",
      webhookUrl: "",
    });

    assert.equal(report.valid, true);
    assert.deepEqual(report.warnings, [
      "REFRESH_INTERVAL_SECONDS 5 is outside [10, 300] and will be clamped.",
      "DEFAULT_WATCHLIST contains malformed instrument ids: BTCUSDT.",
      "Notifications are enabled but neither DISCORD_WEBHOOK_URL nor WEBHOOK_URL is set.",
    ]);
  });
});
