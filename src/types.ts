export const INSTRUMENT_TYPES = ["spot", "perpetual", "futures", "option"] as const;

export type InstrumentType = (typeof INSTRUMENT_TYPES)[number];

export interface Instrument {
  id: string;
  baseCurrency: string;
  quoteCurrency: string;
  instrumentType: InstrumentType;
}

export interface MarketState {
  currentPrice: number;
  /** Price immediately before the last accepted update. 0 until a second price arrives. */
  previousPrice: number;
  high24h: number;
  low24h: number;
  changePercent24h: number;
  openPriceUtc0: number;
  openPriceUtc8: number;
  updatedAt: Date | null;
}

export type PriceDirection = "up" | "down" | "unchanged";

export interface InstrumentSnapshot extends Instrument, MarketState {
  direction: PriceDirection;
}

export type ConnectionState = "disconnected" | "connecting" | "connected" | "failed";

export const PRICE_CHANGE_MODES = ["hours24", "todayUtc", "todayLocal"] as const;

export type PriceChangeMode = (typeof PRICE_CHANGE_MODES)[number];

export interface AlertSettings {
  notifyOnSignificantChanges: boolean;
  significantChangeThreshold: number;
  priceChangeMode: PriceChangeMode;
}

export interface AcceptedPrice {
  id: string;
  previousPrice: number;
  currentPrice: number;
}

export interface PricesUpdatedEvent {
  ids: string[];
  immediate: boolean;
  at: Date;
}

export interface SignificantChangeEvent {
  instrument: Instrument;
  oldPrice: number;
  newPrice: number;
  percentChange: number;
  mode: PriceChangeMode;
}

export interface ConnectionStatusEvent {
  state: ConnectionState;
  retryCount: number;
}

export interface EngineErrorEvent {
  message: string;
  cause?: unknown;
}
