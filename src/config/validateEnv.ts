import logger from "../utils/logger";
import type { EnvConfig } from "./env";

const INSTRUMENT_ID_PATTERN = /^[A-Z0-9]+(-[A-Z0-9]+)+$/;

const isUrl = (value: string, protocols: string[]): boolean => {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
};

export interface EnvironmentReport {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

/** Logs every finding; never exits. */
export const validateEnvironment = (env: EnvConfig): EnvironmentReport => {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!isUrl(env.exchangeWsUrl, ["ws:", "wss:"])) {
    errors.push(`EXCHANGE_WS_URL '${env.exchangeWsUrl}' is not a ws:// or wss:// URL.`);
  }

  if (!isUrl(env.exchangeRestUrl, ["http:", "https:"])) {
    errors.push(`EXCHANGE_REST_URL '${env.exchangeRestUrl}' is not an http(s) URL.`);
  }

  if (env.refreshIntervalSeconds < 10 || env.refreshIntervalSeconds > 300) {
    warnings.push(`REFRESH_INTERVAL_SECONDS ${env.refreshIntervalSeconds} is outside [10, 300] and will be clamped.`);
  }

  const malformed = env.defaultWatchlist.filter((id) => !INSTRUMENT_ID_PATTERN.test(id));
  if (malformed.length > 0) {
    warnings.push(`DEFAULT_WATCHLIST contains malformed instrument ids: ${malformed.join(", ")}.`);
  }

  if (env.notificationsEnabled && !env.discordWebhookUrl && !env.webhookUrl) {
    warnings.push("Notifications are enabled but neither DISCORD_WEBHOOK_URL nor WEBHOOK_URL is set.");
  }

  warnings.forEach((message) => {
    logger.warn({ message }, "Environment validation warning");
  });

  errors.forEach((message) => {
    logger.error({ message }, "Environment validation error");
  });

  if (!warnings.length && !errors.length) {
    logger.info("Environment validation completed successfully");
  }

  return { valid: errors.length === 0, warnings, errors };
};

export default validateEnvironment;
