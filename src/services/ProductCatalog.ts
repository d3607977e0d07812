import { InstrumentFormatError } from "../errors";
import type {
  Instrument,
  InstrumentSnapshot,
  InstrumentType,
  MarketState,
  PriceChangeMode,
  PriceDirection,
} from "../types";

/** Smallest price movement treated as a change. */
export const PRICE_EPSILON = 1e-6;

export const resolveInstrumentType = (id: string): InstrumentType => {
  const upper = id.toUpperCase();
  if (upper.includes("-SWAP")) return "perpetual";
  if (upper.includes("-FUTURES")) return "futures";
  if (upper.includes("-OPTION")) return "option";
  return "spot";
};

export const createInstrument = (rawId: string): Instrument => {
  const id = rawId.trim().toUpperCase();
  const parts = id.split("-");
  if (parts.length < 2 || parts[0].length === 0 || parts[1].length === 0) {
    throw new InstrumentFormatError(rawId);
  }

  return {
    id,
    baseCurrency: parts[0],
    quoteCurrency: parts[1],
    instrumentType: resolveInstrumentType(id),
  };
};

export const emptyMarketState = (): MarketState => ({
  currentPrice: 0,
  previousPrice: 0,
  high24h: 0,
  low24h: 0,
  changePercent24h: 0,
  openPriceUtc0: 0,
  openPriceUtc8: 0,
  updatedAt: null,
});

export const directionOf = (state: Pick<MarketState, "currentPrice" | "previousPrice">): PriceDirection => {
  if (state.previousPrice <= 0) return "unchanged";
  if (state.currentPrice > state.previousPrice) return "up";
  if (state.currentPrice < state.previousPrice) return "down";
  return "unchanged";
};

const percentFrom = (current: number, reference: number): number =>
  reference > 0 ? ((current - reference) / reference) * 100 : 0;

export const changePercentFor = (state: MarketState, mode: PriceChangeMode): number => {
  switch (mode) {
    case "todayUtc":
      return percentFrom(state.currentPrice, state.openPriceUtc0);
    case "todayLocal":
      return percentFrom(state.currentPrice, state.openPriceUtc8);
    case "hours24":
    default:
      return state.changePercent24h;
  }
};

interface CatalogEntry {
  instrument: Instrument;
  state: MarketState;
}

export interface DailyStats {
  high24h: number;
  low24h: number;
  changePercent24h: number;
}

/**
 * Holds the latest market state per instrument. The only place prices are
 * mutated; callers receive copies.
 */
export class ProductCatalog {
  private readonly entries = new Map<string, CatalogEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  ensure(instrument: Instrument): void {
    if (!this.entries.has(instrument.id)) {
      this.entries.set(instrument.id, { instrument: { ...instrument }, state: emptyMarketState() });
    }
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): InstrumentSnapshot | null {
    const entry = this.entries.get(id);
    return entry ? this.toSnapshot(entry) : null;
  }

  /** Snapshots in the order of `ids`, or every known instrument. Unknown ids are skipped. */
  snapshot(ids?: readonly string[]): InstrumentSnapshot[] {
    const selected = ids
      ? ids.flatMap((id) => {
        const entry = this.entries.get(id);
        return entry ? [entry] : [];
      })
      : [...this.entries.values()];
    return selected.map((entry) => this.toSnapshot(entry));
  }

  marketStates(ids?: readonly string[]): Map<string, MarketState> {
    return new Map(this.snapshot(ids).map((snapshot) => [snapshot.id, pickState(snapshot)]));
  }

  /** Seeds state from cache or storage without counting as a price change. */
  restore(id: string, state: MarketState): void {
    const entry = this.entries.get(id);
    if (!entry || state.currentPrice <= 0) {
      return;
    }
    entry.state = { ...state, previousPrice: state.currentPrice };
  }

  /**
   * Accepts `price` when it differs from the current price by more than
   * `PRICE_EPSILON`. Rotates current into previous exactly once.
   */
  applyPrice(id: string, price: number): { previousPrice: number; currentPrice: number } | null {
    const entry = this.entries.get(id);
    if (!entry || !Number.isFinite(price) || price <= 0) {
      return null;
    }

    const { state } = entry;
    if (Math.abs(state.currentPrice - price) <= PRICE_EPSILON) {
      return null;
    }

    const previousPrice = state.currentPrice;
    state.previousPrice = previousPrice;
    state.currentPrice = price;
    state.updatedAt = this.now();
    return { previousPrice, currentPrice: price };
  }

  update24h(id: string, stats: DailyStats): void {
    const entry = this.entries.get(id);
    if (!entry) return;
    entry.state.high24h = stats.high24h;
    entry.state.low24h = stats.low24h;
    entry.state.changePercent24h = stats.changePercent24h;
  }

  /** Zero means "not reported" and leaves the stored open untouched. */
  updateOpenPrices(id: string, openUtc0: number, openUtc8: number): void {
    const entry = this.entries.get(id);
    if (!entry) return;
    if (openUtc0 > 0) entry.state.openPriceUtc0 = openUtc0;
    if (openUtc8 > 0) entry.state.openPriceUtc8 = openUtc8;
  }

  changePercent(id: string, mode: PriceChangeMode): number {
    const entry = this.entries.get(id);
    return entry ? changePercentFor(entry.state, mode) : 0;
  }

  private toSnapshot(entry: CatalogEntry): InstrumentSnapshot {
    return {
      ...entry.instrument,
      ...entry.state,
      direction: directionOf(entry.state),
    };
  }
}

const pickState = (snapshot: InstrumentSnapshot): MarketState => ({
  currentPrice: snapshot.currentPrice,
  previousPrice: snapshot.previousPrice,
  high24h: snapshot.high24h,
  low24h: snapshot.low24h,
  changePercent24h: snapshot.changePercent24h,
  openPriceUtc0: snapshot.openPriceUtc0,
  openPriceUtc8: snapshot.openPriceUtc8,
  updatedAt: snapshot.updatedAt,
});

export default ProductCatalog;
