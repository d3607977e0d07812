import { z } from "zod";
import { exchangeRateEntrySchema, restEnvelopeSchema, tickerEntrySchema, type TickerEntry } from "../schemas/ticker";
import type { InstrumentType } from "../types";
import logger from "../utils/logger";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ExchangeRestClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export const EXCHANGE_INST_TYPES: Record<InstrumentType, string> = {
  spot: "SPOT",
  perpetual: "SWAP",
  futures: "FUTURES",
  option: "OPTION",
};

export class ExchangeApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly code?: string,
  ) {
    super(message);
    this.name = "ExchangeApiError";
  }
}

/**
 * Public market endpoints. Every body is checked against the response
 * envelope; individual ticker entries that fail validation are skipped.
 */
export class ExchangeRestClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ExchangeRestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchTickers(type: InstrumentType): Promise<TickerEntry[]> {
    const data = await this.request(`/api/v5/market/tickers?instType=${EXCHANGE_INST_TYPES[type]}`);
    return this.parseTickers(data);
  }

  async fetchTicker(id: string): Promise<TickerEntry | null> {
    const data = await this.request(`/api/v5/market/ticker?instId=${encodeURIComponent(id)}`);
    return this.parseTickers(data).find((entry) => entry.instId === id) ?? null;
  }

  async fetchUsdCnyRate(): Promise<number> {
    const data = await this.request("/api/v5/market/exchange-rate");
    const parsed = z.array(exchangeRateEntrySchema).min(1).safeParse(data);
    if (!parsed.success) {
      throw new ExchangeApiError("Exchange rate response did not contain usdCny");
    }
    return parsed.data[0].usdCny;
  }

  private parseTickers(data: unknown[]): TickerEntry[] {
    const entries: TickerEntry[] = [];
    let skipped = 0;
    for (const item of data) {
      const parsed = tickerEntrySchema.safeParse(item);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      logger.debug({ skipped }, "Skipped malformed ticker entries");
    }
    return entries;
  }

  private async request(path: string): Promise<unknown[]> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ExchangeApiError(`Exchange API error (${response.status}): ${text}`, response.status);
    }

    const envelope = restEnvelopeSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new ExchangeApiError(`Unexpected response shape from ${path}`, response.status);
    }

    if (envelope.data.code !== "0") {
      throw new ExchangeApiError(
        `Exchange rejected ${path}: ${envelope.data.msg ?? "unknown error"}`,
        response.status,
        envelope.data.code,
      );
    }

    return envelope.data.data;
  }
}

export default ExchangeRestClient;
