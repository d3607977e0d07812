import { EventEmitter } from "events";
import { streamFrameSchema, tickerEntrySchema, type TickerEntry } from "../schemas/ticker";
import type { AcceptedPrice, AlertSettings, PricesUpdatedEvent, SignificantChangeEvent } from "../types";
import logger from "../utils/logger";
import type { ProductCatalog } from "./ProductCatalog";

export type FrameOutcome = "discarded" | "invalid" | "throttled" | "processed";

export interface UpdateReconcilerOptions {
  catalog: ProductCatalog;
  subscriptions: { isSubscribed(id: string): boolean };
  /** Alerts are raised only for watchlist instruments. */
  watchlist: { has(id: string): boolean };
  getDisplayedInstrumentId: () => string | null;
  getAlertSettings: () => AlertSettings;
  /** Every Nth tick of a background instrument is applied. */
  throttleEvery?: number;
  coalesceWindowMs?: number;
  now?: () => Date;
}

const PERCENT_KEYS = ["changePercentage", "changePercent24h", "priceChangePercent"] as const;

const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * 24h change in percent, from the first source available: an explicit
 * percent field (a trailing "%" allowed), the absolute 24h change over the
 * current price, or the 24h open. 0 when none applies.
 */
export const extractChangePercent = (entry: Record<string, unknown>, currentPrice: number): number => {
  for (const key of PERCENT_KEYS) {
    const raw = entry[key];
    if (typeof raw === "string") {
      const trimmed = raw.trim();
      return toNumber(trimmed.endsWith("%") ? trimmed.slice(0, -1) : trimmed) ?? 0;
    }
    if (typeof raw === "number") {
      return Number.isFinite(raw) ? raw : 0;
    }
  }

  const change = toNumber(entry.chg24h);
  if (change !== null && currentPrice > 0) {
    return (change / currentPrice) * 100;
  }

  const open = toNumber(entry.open24h);
  if (open !== null && open > 0 && currentPrice > 0) {
    return ((currentPrice - open) / open) * 100;
  }

  return 0;
};

interface ReconcilerStats {
  frames: number;
  discarded: number;
  invalid: number;
  throttled: number;
  processed: number;
  acceptedPrices: number;
}

/**
 * Turns ticker frames into catalog updates.
 *
 * Emits `prices-updated` (PricesUpdatedEvent), coalesced over a short window
 * and immediate for the displayed instrument, and `significant-change`
 * (SignificantChangeEvent) once per accepted watchlist price, with a prior
 * price, that reaches the alert threshold.
 */
export class UpdateReconciler extends EventEmitter {
  private readonly catalog: ProductCatalog;
  private readonly subscriptions: { isSubscribed(id: string): boolean };
  private readonly watchlist: { has(id: string): boolean };
  private readonly getDisplayedInstrumentId: () => string | null;
  private readonly getAlertSettings: () => AlertSettings;
  private readonly throttleEvery: number;
  private readonly coalesceWindowMs: number;
  private readonly now: () => Date;

  private readonly tickCounts = new Map<string, number>();
  private readonly pendingIds = new Set<string>();
  private coalesceTimer?: NodeJS.Timeout;
  private readonly stats: ReconcilerStats = {
    frames: 0,
    discarded: 0,
    invalid: 0,
    throttled: 0,
    processed: 0,
    acceptedPrices: 0,
  };

  constructor(options: UpdateReconcilerOptions) {
    super();
    this.catalog = options.catalog;
    this.subscriptions = options.subscriptions;
    this.watchlist = options.watchlist;
    this.getDisplayedInstrumentId = options.getDisplayedInstrumentId;
    this.getAlertSettings = options.getAlertSettings;
    this.throttleEvery = Math.max(1, Math.floor(options.throttleEvery ?? 3));
    this.coalesceWindowMs = options.coalesceWindowMs ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  handleFrame(raw: string): FrameOutcome {
    this.stats.frames++;
    const outcome = this.classify(raw);
    this.stats[outcome]++;
    return outcome;
  }

  /**
   * Applies polled or cached tickers through the same acceptance rule as the
   * stream, without throttling. Returns the ids whose price changed.
   */
  applySnapshot(entries: readonly TickerEntry[]): string[] {
    const known = entries.filter((entry) => this.catalog.has(entry.instId));
    return this.apply(known);
  }

  getStats(): ReconcilerStats {
    return { ...this.stats };
  }

  /** Forgets throttle positions, e.g. for a fresh session. */
  resetThrottle(): void {
    this.tickCounts.clear();
  }

  dispose(): void {
    if (this.coalesceTimer) {
      clearTimeout(this.coalesceTimer);
      this.coalesceTimer = undefined;
    }
    this.pendingIds.clear();
  }

  private classify(raw: string): FrameOutcome {
    const text = raw.trim();
    if (text.length === 0 || text === "pong") {
      return "discarded";
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      logger.warn({ err: error, length: text.length }, "Dropping unparseable frame");
      return "invalid";
    }

    const frame = streamFrameSchema.safeParse(payload);
    if (!frame.success) {
      logger.warn({ issues: frame.error.issues.length }, "Dropping malformed frame");
      return "invalid";
    }

    if (frame.data.event === "error") {
      logger.warn({ code: frame.data.code, msg: frame.data.msg }, "Stream reported an error");
    }

    const data = frame.data.data;
    if (!data) {
      return "discarded";
    }

    const entries: TickerEntry[] = [];
    for (const item of data) {
      const entry = tickerEntrySchema.safeParse(item);
      if (entry.success) {
        entries.push(entry.data);
      } else {
        logger.debug({ issues: entry.error.issues.length }, "Skipping malformed ticker entry");
      }
    }

    const relevant = entries.filter((entry) => this.subscriptions.isSubscribed(entry.instId));
    if (relevant.length === 0) {
      return entries.length === 0 && data.length > 0 ? "invalid" : "discarded";
    }

    const displayed = this.getDisplayedInstrumentId();
    const priority = displayed !== null && relevant.some((entry) => entry.instId === displayed);
    const selected = priority ? relevant : relevant.filter((entry) => this.admit(entry.instId));

    if (selected.length === 0) {
      return "throttled";
    }

    this.apply(selected);
    return "processed";
  }

  // Round-robin per instrument: the first tick, then every Nth.
  private admit(id: string): boolean {
    const count = (this.tickCounts.get(id) ?? 0) + 1;
    this.tickCounts.set(id, count);
    return (count - 1) % this.throttleEvery === 0;
  }

  private apply(entries: readonly TickerEntry[]): string[] {
    const changed: string[] = [];

    for (const entry of entries) {
      const id = entry.instId;
      const accepted = this.catalog.applyPrice(id, entry.last);

      if (entry.high24h !== undefined && entry.low24h !== undefined) {
        this.catalog.update24h(id, {
          high24h: entry.high24h,
          low24h: entry.low24h,
          changePercent24h: extractChangePercent(entry, entry.last),
        });
      }
      this.catalog.updateOpenPrices(id, entry.sodUtc0 ?? 0, entry.sodUtc8 ?? 0);

      if (accepted) {
        this.stats.acceptedPrices++;
        if (!changed.includes(id)) changed.push(id);
        this.checkSignificantChange({ id, ...accepted });
      }
    }

    if (changed.length > 0) {
      this.schedulePricesUpdated(changed);
    }
    return changed;
  }

  private checkSignificantChange(price: AcceptedPrice): void {
    const settings = this.getAlertSettings();
    if (!settings.notifyOnSignificantChanges || !this.watchlist.has(price.id)) {
      return;
    }
    // First price of a session has nothing to compare against.
    if (price.previousPrice <= 0) {
      return;
    }

    const percentChange = this.catalog.changePercent(price.id, settings.priceChangeMode);
    // Inclusive: a move exactly at the threshold fires.
    if (Math.abs(percentChange) < settings.significantChangeThreshold) {
      return;
    }

    const snapshot = this.catalog.get(price.id);
    if (!snapshot) {
      return;
    }

    const event: SignificantChangeEvent = {
      instrument: {
        id: snapshot.id,
        baseCurrency: snapshot.baseCurrency,
        quoteCurrency: snapshot.quoteCurrency,
        instrumentType: snapshot.instrumentType,
      },
      oldPrice: price.previousPrice,
      newPrice: price.currentPrice,
      percentChange,
      mode: settings.priceChangeMode,
    };
    this.emit("significant-change", event);
  }

  private schedulePricesUpdated(ids: readonly string[]): void {
    ids.forEach((id) => this.pendingIds.add(id));

    const displayed = this.getDisplayedInstrumentId();
    if (displayed !== null && ids.includes(displayed)) {
      this.flushPricesUpdated(true);
      return;
    }

    if (!this.coalesceTimer) {
      this.coalesceTimer = setTimeout(() => this.flushPricesUpdated(false), this.coalesceWindowMs);
    }
  }

  private flushPricesUpdated(immediate: boolean): void {
    if (this.coalesceTimer) {
      clearTimeout(this.coalesceTimer);
      this.coalesceTimer = undefined;
    }
    if (this.pendingIds.size === 0) {
      return;
    }

    const event: PricesUpdatedEvent = { ids: [...this.pendingIds], immediate, at: this.now() };
    this.pendingIds.clear();
    this.emit("prices-updated", event);
  }
}

export default UpdateReconciler;
