import type { ZodType, ZodTypeDef } from "zod";
import type { KeyValueStore } from "./KeyValueStore";
import { PersistenceError } from "../errors";
import {
  alertSettingsSchema,
  exchangeRateRecordSchema,
  priceCacheSchema,
  watchlistDocumentSchema,
  type MarketStateRecord,
  type WatchlistRecord,
} from "../schemas/preferences";
import type { AlertSettings, MarketState } from "../types";
import logger from "../utils/logger";

export const PREFERENCE_KEYS = {
  watchlist: "watchlist",
  priceCache: "priceCache",
  exchangeRate: "exchangeRate",
  displayedInstrument: "currentDisplayId",
  refreshInterval: "refreshIntervalSeconds",
  alertSettings: "alertSettings",
} as const;

export const PRICE_CACHE_TTL_MS = 30 * 60 * 1000;

export const DEFAULT_ALERT_SETTINGS: AlertSettings = {
  notifyOnSignificantChanges: false,
  significantChangeThreshold: 5,
  priceChangeMode: "hours24",
};

export const toMarketStateRecord = (state: MarketState): MarketStateRecord => ({
  currentPrice: state.currentPrice,
  previousPrice: state.previousPrice,
  high24h: state.high24h,
  low24h: state.low24h,
  changePercent24h: state.changePercent24h,
  openPriceUtc0: state.openPriceUtc0,
  openPriceUtc8: state.openPriceUtc8,
  updatedAt: state.updatedAt ? state.updatedAt.toISOString() : null,
});

export const toMarketState = (record: MarketStateRecord): MarketState => ({
  currentPrice: record.currentPrice,
  previousPrice: record.previousPrice,
  high24h: record.high24h,
  low24h: record.low24h,
  changePercent24h: record.changePercent24h,
  openPriceUtc0: record.openPriceUtc0,
  openPriceUtc8: record.openPriceUtc8,
  updatedAt: record.updatedAt ? new Date(record.updatedAt) : null,
});

export interface PreferencesRepositoryOptions {
  now?: () => Date;
}

/**
 * Typed access to the engine's persisted preferences. Everything that leaves
 * the store is validated; writes surface as `PersistenceError`.
 */
export class PreferencesRepository {
  private readonly now: () => Date;

  constructor(
    private readonly store: KeyValueStore,
    options: PreferencesRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  /** `null` when nothing was saved yet. Throws when the saved document is corrupt. */
  loadWatchlist(): WatchlistRecord[] | null {
    const raw = this.read(PREFERENCE_KEYS.watchlist);
    if (raw === undefined) {
      return null;
    }
    const parsed = watchlistDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(PREFERENCE_KEYS.watchlist, "Saved watchlist is malformed", parsed.error);
    }
    return parsed.data;
  }

  async saveWatchlist(records: WatchlistRecord[]): Promise<void> {
    await this.write(PREFERENCE_KEYS.watchlist, records);
  }

  /** Cached market states, or `null` once they are older than thirty minutes. */
  loadPriceCache(): Map<string, MarketState> | null {
    const cache = this.readOptional(PREFERENCE_KEYS.priceCache, priceCacheSchema);
    if (!cache) {
      return null;
    }

    const age = this.now().getTime() - new Date(cache.savedAt).getTime();
    if (age > PRICE_CACHE_TTL_MS) {
      logger.debug({ ageMs: age }, "Price cache expired");
      return null;
    }

    return new Map(Object.entries(cache.prices).map(([id, record]) => [id, toMarketState(record)]));
  }

  async savePriceCache(states: Map<string, MarketState>): Promise<void> {
    const prices: Record<string, MarketStateRecord> = {};
    states.forEach((state, id) => {
      if (state.currentPrice > 0) {
        prices[id] = toMarketStateRecord(state);
      }
    });
    await this.write(PREFERENCE_KEYS.priceCache, { savedAt: this.now().toISOString(), prices });
  }

  loadExchangeRate(): { rate: number; fetchedAt: Date } | null {
    const record = this.readOptional(PREFERENCE_KEYS.exchangeRate, exchangeRateRecordSchema);
    return record ? { rate: record.rate, fetchedAt: new Date(record.fetchedAt) } : null;
  }

  async saveExchangeRate(rate: number, fetchedAt: Date): Promise<void> {
    await this.write(PREFERENCE_KEYS.exchangeRate, { rate, fetchedAt: fetchedAt.toISOString() });
  }

  getDisplayedInstrumentId(): string | null {
    const raw = this.read(PREFERENCE_KEYS.displayedInstrument);
    return typeof raw === "string" && raw.length > 0 ? raw : null;
  }

  async setDisplayedInstrumentId(id: string | null): Promise<void> {
    if (id === null) {
      await this.remove(PREFERENCE_KEYS.displayedInstrument);
      return;
    }
    await this.write(PREFERENCE_KEYS.displayedInstrument, id);
  }

  getRefreshIntervalSeconds(): number | null {
    const raw = this.read(PREFERENCE_KEYS.refreshInterval);
    return typeof raw === "number" && Number.isFinite(raw) ? raw : null;
  }

  async setRefreshIntervalSeconds(seconds: number): Promise<void> {
    await this.write(PREFERENCE_KEYS.refreshInterval, seconds);
  }

  getAlertSettings(): AlertSettings {
    return this.readOptional(PREFERENCE_KEYS.alertSettings, alertSettingsSchema) ?? { ...DEFAULT_ALERT_SETTINGS };
  }

  async saveAlertSettings(settings: AlertSettings): Promise<void> {
    await this.write(PREFERENCE_KEYS.alertSettings, settings);
  }

  async clear(): Promise<void> {
    for (const key of Object.values(PREFERENCE_KEYS)) {
      await this.remove(key);
    }
  }

  private read(key: string): unknown {
    try {
      return this.store.get(key);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(key, `Failed to read '${key}'`, error);
    }
  }

  /** Best-effort values: anything missing or malformed reads as absent. */
  private readOptional<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
    const raw = this.read(key);
    if (raw === undefined) {
      return null;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ key, issues: parsed.error.issues.length }, "Ignoring malformed preference");
      return null;
    }
    return parsed.data;
  }

  private async write(key: string, value: unknown): Promise<void> {
    try {
      await this.store.set(key, value);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(key, `Failed to save '${key}'`, error);
    }
  }

  private async remove(key: string): Promise<void> {
    try {
      await this.store.delete(key);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(key, `Failed to delete '${key}'`, error);
    }
  }
}

export default PreferencesRepository;
