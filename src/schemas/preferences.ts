import { z } from "zod";
import { INSTRUMENT_TYPES, PRICE_CHANGE_MODES } from "../types";

export const instrumentTypeSchema = z.enum(INSTRUMENT_TYPES);

export const priceChangeModeSchema = z.enum(PRICE_CHANGE_MODES);

export const marketStateRecordSchema = z.object({
  currentPrice: z.number().nonnegative().default(0),
  previousPrice: z.number().nonnegative().default(0),
  high24h: z.number().nonnegative().default(0),
  low24h: z.number().nonnegative().default(0),
  changePercent24h: z.number().default(0),
  openPriceUtc0: z.number().nonnegative().default(0),
  openPriceUtc8: z.number().nonnegative().default(0),
  updatedAt: z.string().datetime().nullable().default(null),
});

export type MarketStateRecord = z.infer<typeof marketStateRecordSchema>;

export const watchlistRecordSchema = z.object({
  id: z.string().min(1),
  instrumentType: instrumentTypeSchema.optional(),
  state: marketStateRecordSchema.optional(),
});

export type WatchlistRecord = z.infer<typeof watchlistRecordSchema>;

export const watchlistDocumentSchema = z.array(watchlistRecordSchema);

export const priceCacheSchema = z.object({
  savedAt: z.string().datetime(),
  prices: z.record(z.string(), marketStateRecordSchema),
});

export type PriceCache = z.infer<typeof priceCacheSchema>;

export const exchangeRateRecordSchema = z.object({
  rate: z.number().positive(),
  fetchedAt: z.string().datetime(),
});

export type ExchangeRateRecord = z.infer<typeof exchangeRateRecordSchema>;

export const alertSettingsSchema = z.object({
  notifyOnSignificantChanges: z.boolean().default(false),
  significantChangeThreshold: z.number().positive().max(100).default(5),
  priceChangeMode: priceChangeModeSchema.default("hours24"),
});
