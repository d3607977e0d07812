import type { PreferencesRepository } from "../persistence/PreferencesRepository";
import logger from "../utils/logger";
import type { ExchangeRestClient } from "./ExchangeRestClient";

export const DEFAULT_USD_CNY_RATE = 7.16;
export const RATE_VALIDITY_MS = 60 * 60 * 1000;
export const RATE_REFRESH_INTERVAL_MS = 2 * 60 * 60 * 1000;

export type DisplayCurrency = "USD" | "CNY";

export interface ExchangeRateServiceOptions {
  client: Pick<ExchangeRestClient, "fetchUsdCnyRate">;
  repository: Pick<PreferencesRepository, "loadExchangeRate" | "saveExchangeRate">;
  refreshIntervalMs?: number;
  now?: () => Date;
}

/** USD to CNY for display conversion only. */
export class ExchangeRateService {
  private readonly client: Pick<ExchangeRestClient, "fetchUsdCnyRate">;
  private readonly repository: Pick<PreferencesRepository, "loadExchangeRate" | "saveExchangeRate">;
  private readonly refreshIntervalMs: number;
  private readonly now: () => Date;

  private rate = DEFAULT_USD_CNY_RATE;
  private fetchedAt: Date | null = null;
  private timer?: NodeJS.Timeout;

  constructor(options: ExchangeRateServiceOptions) {
    this.client = options.client;
    this.repository = options.repository;
    this.refreshIntervalMs = options.refreshIntervalMs ?? RATE_REFRESH_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async start(): Promise<void> {
    this.loadCached();
    if (!this.isFresh()) {
      await this.refresh();
    }
    this.stop();
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  getRate(): number {
    return this.rate;
  }

  getFetchedAt(): Date | null {
    return this.fetchedAt;
  }

  isFresh(): boolean {
    return this.fetchedAt !== null && this.now().getTime() - this.fetchedAt.getTime() < RATE_VALIDITY_MS;
  }

  convert(amountUsd: number, currency: DisplayCurrency): number {
    return currency === "CNY" ? amountUsd * this.rate : amountUsd;
  }

  /** Keeps the previous rate when the lookup fails. */
  async refresh(): Promise<number> {
    try {
      const rate = await this.client.fetchUsdCnyRate();
      const fetchedAt = this.now();
      this.rate = rate;
      this.fetchedAt = fetchedAt;
      await this.repository.saveExchangeRate(rate, fetchedAt);
      logger.debug({ rate }, "Exchange rate refreshed");
    } catch (error) {
      logger.warn({ err: error, rate: this.rate }, "Exchange rate refresh failed");
    }
    return this.rate;
  }

  private loadCached(): void {
    try {
      const cached = this.repository.loadExchangeRate();
      if (cached) {
        this.rate = cached.rate;
        this.fetchedAt = cached.fetchedAt;
      }
    } catch (error) {
      logger.warn({ err: error }, "Ignoring unreadable cached exchange rate");
    }
  }
}

export default ExchangeRateService;
