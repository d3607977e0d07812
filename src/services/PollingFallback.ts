import type { PreferencesRepository } from "../persistence/PreferencesRepository";
import type { TickerEntry } from "../schemas/ticker";
import type { Instrument, InstrumentType } from "../types";
import logger from "../utils/logger";
import type { ExchangeRestClient } from "./ExchangeRestClient";
import type { ProductCatalog } from "./ProductCatalog";
import type { UpdateReconciler } from "./UpdateReconciler";

export const MIN_REFRESH_INTERVAL_SECONDS = 10;
export const MAX_REFRESH_INTERVAL_SECONDS = 300;
export const DEFAULT_REFRESH_INTERVAL_SECONDS = 60;

export const clampRefreshInterval = (seconds: number): number => {
  if (!Number.isFinite(seconds)) return DEFAULT_REFRESH_INTERVAL_SECONDS;
  return Math.min(MAX_REFRESH_INTERVAL_SECONDS, Math.max(MIN_REFRESH_INTERVAL_SECONDS, Math.round(seconds)));
};

export interface PollingFallbackOptions {
  client: Pick<ExchangeRestClient, "fetchTickers" | "fetchTicker">;
  reconciler: Pick<UpdateReconciler, "applySnapshot">;
  catalog: Pick<ProductCatalog, "marketStates">;
  watchlist: { getInstruments(): Instrument[] };
  connection: { isConnected(): boolean; ensureConnected(): boolean };
  repository: Pick<PreferencesRepository, "savePriceCache" | "setRefreshIntervalSeconds">;
  intervalSeconds?: number;
}

export interface PollResult {
  types: InstrumentType[];
  updated: string[];
  missing: string[];
  reconnectRequested: boolean;
}

/**
 * Periodic REST refresh of the watchlist. Runs whether or not the stream is
 * up and nudges the stream back when it sits idle.
 */
export class PollingFallback {
  private intervalSeconds: number;
  private timer?: NodeJS.Timeout;
  private inProgress: Promise<PollResult> | null = null;

  constructor(private readonly options: PollingFallbackOptions) {
    this.intervalSeconds = clampRefreshInterval(options.intervalSeconds ?? DEFAULT_REFRESH_INTERVAL_SECONDS);
  }

  getIntervalSeconds(): number {
    return this.intervalSeconds;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(intervalSeconds?: number): void {
    if (intervalSeconds !== undefined) {
      this.intervalSeconds = clampRefreshInterval(intervalSeconds);
    }
    this.stop();
    this.timer = setInterval(() => {
      void this.poll();
    }, this.intervalSeconds * 1000);
    logger.info({ intervalSeconds: this.intervalSeconds }, "Polling started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Clamps, rearms the timer, saves the value and polls right away. */
  async setIntervalSeconds(seconds: number): Promise<number> {
    this.intervalSeconds = clampRefreshInterval(seconds);
    if (this.isRunning()) {
      this.start();
    }

    try {
      await this.options.repository.setRefreshIntervalSeconds(this.intervalSeconds);
    } catch (error) {
      logger.error({ err: error }, "Failed to save refresh interval");
    }

    await this.poll();
    return this.intervalSeconds;
  }

  /** Overlapping calls share the poll already running. Never rejects. */
  poll(): Promise<PollResult> {
    if (!this.inProgress) {
      this.inProgress = this.runPoll()
        .catch((error: unknown): PollResult => {
          logger.error({ err: error }, "Poll failed");
          return { types: [], updated: [], missing: [], reconnectRequested: false };
        })
        .finally(() => {
          this.inProgress = null;
        });
    }
    return this.inProgress;
  }

  private async runPoll(): Promise<PollResult> {
    const { client, reconciler, catalog, watchlist, connection, repository } = this.options;
    const instruments = watchlist.getInstruments();
    const ids = instruments.map((instrument) => instrument.id);

    try {
      await repository.savePriceCache(catalog.marketStates(ids));
    } catch (error) {
      logger.error({ err: error }, "Failed to save price cache");
    }

    let reconnectRequested = false;
    if (!connection.isConnected()) {
      reconnectRequested = connection.ensureConnected();
    }

    const wanted = new Set(ids);
    const types = [...new Set(instruments.map((instrument) => instrument.instrumentType))];
    const found = new Map<string, TickerEntry>();

    for (const type of types) {
      try {
        const tickers = await client.fetchTickers(type);
        tickers.forEach((ticker) => {
          if (wanted.has(ticker.instId)) found.set(ticker.instId, ticker);
        });
      } catch (error) {
        logger.warn({ err: error, type }, "Bulk ticker fetch failed");
      }
    }

    const missing: string[] = [];
    for (const id of ids.filter((entry) => !found.has(entry))) {
      try {
        const ticker = await client.fetchTicker(id);
        if (ticker) {
          found.set(id, ticker);
        } else {
          missing.push(id);
        }
      } catch (error) {
        logger.warn({ err: error, instId: id }, "Ticker lookup failed");
        missing.push(id);
      }
    }

    // Watchlist order keeps per-instrument updates in a stable sequence.
    const entries = ids.flatMap((id) => {
      const ticker = found.get(id);
      return ticker ? [ticker] : [];
    });
    const updated = reconciler.applySnapshot(entries);

    logger.debug({ types, updated: updated.length, missing: missing.length }, "Poll completed");
    return { types, updated, missing, reconnectRequested };
  }
}

export default PollingFallback;
