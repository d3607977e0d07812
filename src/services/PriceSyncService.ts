import { EventEmitter } from "events";
import type { PersistenceError } from "../errors";
import { DEFAULT_ALERT_SETTINGS, type PreferencesRepository } from "../persistence/PreferencesRepository";
import type {
  AlertSettings,
  ConnectionState,
  ConnectionStatusEvent,
  EngineErrorEvent,
  Instrument,
  InstrumentSnapshot,
  PricesUpdatedEvent,
  SignificantChangeEvent,
} from "../types";
import logger from "../utils/logger";
import type { DisplayCurrency, ExchangeRateService } from "./ExchangeRateService";
import type { PollingFallback } from "./PollingFallback";
import { changePercentFor, type ProductCatalog } from "./ProductCatalog";
import type { StreamConnection } from "./StreamConnection";
import type { SubscriptionManager } from "./SubscriptionManager";
import type { FrameOutcome, UpdateReconciler } from "./UpdateReconciler";
import type { TypeCorrection, WatchlistStore } from "./WatchlistStore";

export interface PriceSyncServiceOptions {
  repository: PreferencesRepository;
  catalog: ProductCatalog;
  watchlist: WatchlistStore;
  connection: StreamConnection;
  subscriptions: SubscriptionManager;
  reconciler: UpdateReconciler;
  polling: PollingFallback;
  exchangeRates: ExchangeRateService;
  defaultRefreshIntervalSeconds?: number;
}

export interface PriceView extends InstrumentSnapshot {
  currency: DisplayCurrency;
  /** Percent change under the selected calculation mode. */
  changePercent: number;
}

export interface ConnectionFailedEvent {
  attempts: number;
}

export interface EngineStatus {
  state: ConnectionState;
  retryCount: number;
  subscriptions: string[];
  pendingSubscriptions: string[];
  displayedInstrumentId: string | null;
  refreshIntervalSeconds: number;
  pollingActive: boolean;
  exchangeRate: { usdCny: number; fetchedAt: Date | null };
  frames: ReturnType<UpdateReconciler["getStats"]>;
}

/**
 * Wires the engine together and is the single surface consumers talk to.
 *
 * Re-emits `prices-updated`, `significant-change`, `connection-status`,
 * `connection-failed`, `displayed-changed` and `error`.
 */
export class PriceSyncService extends EventEmitter {
  private readonly repository: PreferencesRepository;
  private readonly catalog: ProductCatalog;
  private readonly watchlist: WatchlistStore;
  private readonly connection: StreamConnection;
  private readonly subscriptions: SubscriptionManager;
  private readonly reconciler: UpdateReconciler;
  private readonly polling: PollingFallback;
  private readonly exchangeRates: ExchangeRateService;
  private readonly defaultRefreshIntervalSeconds?: number;

  private displayedId: string | null = null;
  private alertSettings: AlertSettings = { ...DEFAULT_ALERT_SETTINGS };
  private running = false;

  constructor(options: PriceSyncServiceOptions) {
    super();
    this.repository = options.repository;
    this.catalog = options.catalog;
    this.watchlist = options.watchlist;
    this.connection = options.connection;
    this.subscriptions = options.subscriptions;
    this.reconciler = options.reconciler;
    this.polling = options.polling;
    this.exchangeRates = options.exchangeRates;
    this.defaultRefreshIntervalSeconds = options.defaultRefreshIntervalSeconds;
    this.wire();
  }

  private wire(): void {
    this.connection.on("frame", (raw: string) => {
      const outcome: FrameOutcome = this.reconciler.handleFrame(raw);
      if (outcome === "invalid") {
        logger.debug("Dropped an invalid frame");
      }
    });

    this.connection.on("ready", () => {
      this.reconciler.resetThrottle();
      void this.subscriptions.restore();
    });

    this.connection.on("state", (event: ConnectionStatusEvent) => {
      if (event.state !== "connected") {
        this.subscriptions.reset();
      }
      this.emit("connection-status", event);
    });

    this.connection.on("failed", (event: ConnectionFailedEvent) => {
      this.emit("connection-failed", event);
    });

    this.reconciler.on("prices-updated", (event: PricesUpdatedEvent) => this.emit("prices-updated", event));
    this.reconciler.on("significant-change", (event: SignificantChangeEvent) => this.emit("significant-change", event));

    this.watchlist.on("added", (instrument: Instrument) => {
      void this.subscriptions.subscribe(instrument.id);
      if (this.displayedId === null) {
        void this.changeDisplayed(instrument.id);
      }
    });

    this.watchlist.on("removed", (id: string) => {
      void this.subscriptions.unsubscribe(id);
      if (this.displayedId === id) {
        void this.changeDisplayed(this.watchlist.getIds()[0] ?? null);
      }
    });

    this.watchlist.on("reset", (ids: string[]) => {
      void this.subscriptions.reconcile(ids, this.connection.getState());
      void this.changeDisplayed(ids[0] ?? null);
    });

    this.watchlist.on("type-corrected", (correction: TypeCorrection) => {
      logger.info(correction, "Instrument type corrected");
    });

    this.watchlist.on("persistence-error", (error: PersistenceError) => {
      this.reportError(`Failed to persist ${error.key}`, error);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;

    await this.repository.initialize();
    this.alertSettings = this.repository.getAlertSettings();

    const { ids } = await this.watchlist.load();
    this.restorePriceCache(ids);

    const saved = this.repository.getDisplayedInstrumentId();
    await this.changeDisplayed(saved !== null && ids.includes(saved) ? saved : ids[0] ?? null);

    this.connection.connect();

    const interval = this.repository.getRefreshIntervalSeconds() ?? this.defaultRefreshIntervalSeconds;
    this.polling.start(interval);
    void this.polling.poll();
    void this.exchangeRates.start();

    this.running = true;
    logger.info({ instruments: ids.length, displayed: this.displayedId }, "Price sync started");
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.polling.stop();
    this.exchangeRates.stop();
    this.connection.disconnect();
    this.reconciler.dispose();

    try {
      await this.repository.savePriceCache(this.catalog.marketStates(this.watchlist.getIds()));
    } catch (error) {
      this.reportError("Failed to save price cache", error);
    }
    await this.watchlist.saveSnapshot();
    logger.info("Price sync stopped");
  }

  reconnect(): void {
    logger.info("Manual reconnect requested");
    this.connection.reconnect();
  }

  getDisplayedInstrumentId(): string | null {
    return this.displayedId;
  }

  /** Only instruments on the watchlist can be displayed. */
  async setDisplayedInstrument(id: string): Promise<boolean> {
    const normalized = id.trim().toUpperCase();
    if (!this.watchlist.has(normalized)) {
      return false;
    }
    await this.changeDisplayed(normalized);
    return true;
  }

  getAlertSettings(): AlertSettings {
    return { ...this.alertSettings };
  }

  async updateAlertSettings(update: Partial<AlertSettings>): Promise<AlertSettings> {
    this.alertSettings = { ...this.alertSettings, ...update };
    try {
      await this.repository.saveAlertSettings(this.alertSettings);
    } catch (error) {
      this.reportError("Failed to save alert settings", error);
    }
    return this.getAlertSettings();
  }

  getRefreshIntervalSeconds(): number {
    return this.polling.getIntervalSeconds();
  }

  async setRefreshIntervalSeconds(seconds: number): Promise<number> {
    return this.polling.setIntervalSeconds(seconds);
  }

  getSnapshot(currency: DisplayCurrency = "USD"): PriceView[] {
    return this.catalog.snapshot(this.watchlist.getIds()).map((snapshot) => this.toView(snapshot, currency));
  }

  getPrice(id: string, currency: DisplayCurrency = "USD"): PriceView | null {
    const normalized = id.trim().toUpperCase();
    const snapshot = this.catalog.get(normalized);
    return snapshot ? this.toView(snapshot, currency) : null;
  }

  getStatus(): EngineStatus {
    return {
      state: this.connection.getState(),
      retryCount: this.connection.getReconnectAttempts(),
      subscriptions: this.subscriptions.getSubscriptions(),
      pendingSubscriptions: this.subscriptions.getPendingBatch(),
      displayedInstrumentId: this.displayedId,
      refreshIntervalSeconds: this.polling.getIntervalSeconds(),
      pollingActive: this.polling.isRunning(),
      exchangeRate: { usdCny: this.exchangeRates.getRate(), fetchedAt: this.exchangeRates.getFetchedAt() },
      frames: this.reconciler.getStats(),
    };
  }

  /** Clears every stored preference and returns to the default watchlist. */
  async resetData(): Promise<void> {
    try {
      await this.repository.clear();
    } catch (error) {
      this.reportError("Failed to clear stored preferences", error);
    }
    this.alertSettings = { ...DEFAULT_ALERT_SETTINGS };
    await this.watchlist.reset();
    logger.info("Stored data reset");
  }

  private toView(snapshot: InstrumentSnapshot, currency: DisplayCurrency): PriceView {
    const convert = (amount: number) => this.exchangeRates.convert(amount, currency);
    return {
      ...snapshot,
      currentPrice: convert(snapshot.currentPrice),
      previousPrice: convert(snapshot.previousPrice),
      high24h: convert(snapshot.high24h),
      low24h: convert(snapshot.low24h),
      openPriceUtc0: convert(snapshot.openPriceUtc0),
      openPriceUtc8: convert(snapshot.openPriceUtc8),
      currency,
      changePercent: changePercentFor(snapshot, this.alertSettings.priceChangeMode),
    };
  }

  private restorePriceCache(ids: readonly string[]): void {
    let cache: ReturnType<PreferencesRepository["loadPriceCache"]> = null;
    try {
      cache = this.repository.loadPriceCache();
    } catch (error) {
      this.reportError("Failed to read price cache", error);
    }
    if (!cache) return;

    let restored = 0;
    ids.forEach((id) => {
      const state = cache?.get(id);
      if (state) {
        this.catalog.restore(id, state);
        restored++;
      }
    });
    logger.info({ restored }, "Price cache applied");
  }

  private async changeDisplayed(id: string | null): Promise<void> {
    if (this.displayedId === id) return;
    this.displayedId = id;
    this.emit("displayed-changed", { id });
    try {
      await this.repository.setDisplayedInstrumentId(id);
    } catch (error) {
      this.reportError("Failed to save displayed instrument", error);
    }
  }

  private reportError(message: string, cause: unknown): void {
    logger.error({ err: cause }, message);
    // EventEmitter throws on an "error" event nobody listens to.
    if (this.listenerCount("error") > 0) {
      const event: EngineErrorEvent = { message, cause };
      this.emit("error", event);
    }
  }
}

export default PriceSyncService;
