import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const parseNumberWithFallback = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseList = (value: string | undefined, fallback: string[]): string[] => {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

const DEFAULT_STORE_DIRECTORY = path.resolve(process.cwd(), "data/preferences-store");
const DEFAULT_STORE_FILE = path.resolve(process.cwd(), "data/preferences-store.json");

const parsePreferencesStore = (
  backendRaw: string | undefined,
  storeRaw: string | undefined,
): { backend: "file" | "lmdb"; path: string } => {
  const resolvedStore = storeRaw ? path.resolve(process.cwd(), storeRaw) : undefined;
  const normalizedBackend = backendRaw?.trim().toLowerCase();

  let backend: "file" | "lmdb";

  if (normalizedBackend === "file" || normalizedBackend === "lmdb") {
    backend = normalizedBackend;
  } else if (resolvedStore?.endsWith(".json")) {
    backend = "file";
  } else {
    backend = "lmdb";
  }

  return {
    backend,
    path: resolvedStore ?? (backend === "file" ? DEFAULT_STORE_FILE : DEFAULT_STORE_DIRECTORY),
  };
};

const preferencesStore = parsePreferencesStore(process.env.PREFERENCES_BACKEND, process.env.PREFERENCES_STORE);

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: parseNumberWithFallback(process.env.PORT, 3000),

  // Exchange endpoints
  exchangeWsUrl: process.env.EXCHANGE_WS_URL ?? "wss://ws.okx.com:8443/ws/v5/public",
  exchangeRestUrl: process.env.EXCHANGE_REST_URL ?? "https://www.okx.com",
  restTimeoutMs: parseNumberWithFallback(process.env.REST_TIMEOUT_MS, 10000),

  preferencesBackend: preferencesStore.backend,
  preferencesStorePath: preferencesStore.path,

  // Streaming engine
  defaultWatchlist: parseList(process.env.DEFAULT_WATCHLIST, ["BTC-USDT", "ETH-USDT"]),
  refreshIntervalSeconds: parseNumberWithFallback(process.env.REFRESH_INTERVAL_SECONDS, 60),
  heartbeatIntervalMs: parseNumberWithFallback(process.env.HEARTBEAT_INTERVAL_MS, 30000),
  reconnectBaseDelayMs: parseNumberWithFallback(process.env.RECONNECT_BASE_DELAY_MS, 5000),
  maxReconnectAttempts: parseNumberWithFallback(process.env.MAX_RECONNECT_ATTEMPTS, 10),

  // Notification Settings
  notificationsEnabled: process.env.NOTIFICATIONS_ENABLED !== "false",
  discordWebhookUrl: process.env.DISCORD_WEBHOOK_URL ?? "",
  webhookUrl: process.env.WEBHOOK_URL ?? "",
  alertCooldownMs: parseNumberWithFallback(process.env.ALERT_COOLDOWN_MS, 5 * 60 * 1000),
};

export type EnvConfig = typeof env;

export default env;
