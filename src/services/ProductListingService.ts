import { InstrumentFormatError } from "../errors";
import type { InstrumentSnapshot, InstrumentType } from "../types";
import logger from "../utils/logger";
import type { ExchangeRestClient } from "./ExchangeRestClient";
import { createInstrument, type ProductCatalog } from "./ProductCatalog";
import type { UpdateReconciler } from "./UpdateReconciler";

export const LISTED_QUOTE_CURRENCIES: ReadonlySet<string> = new Set(["USDT", "USDC", "USD"]);

export interface ProductListingServiceOptions {
  client: Pick<ExchangeRestClient, "fetchTickers">;
  catalog: ProductCatalog;
  reconciler: Pick<UpdateReconciler, "applySnapshot">;
}

export class ProductListingService {
  private readonly listings = new Map<InstrumentType, string[]>();

  constructor(private readonly options: ProductListingServiceOptions) {}

  /**
   * Loads every dollar-quoted instrument of one type into the catalog, sorted
   * by base currency, and returns their snapshots.
   */
  async fetchListing(type: InstrumentType): Promise<InstrumentSnapshot[]> {
    const { client, catalog, reconciler } = this.options;
    const tickers = await client.fetchTickers(type);

    const listed = tickers.flatMap((ticker) => {
      try {
        const instrument = createInstrument(ticker.instId);
        return LISTED_QUOTE_CURRENCIES.has(instrument.quoteCurrency) ? [{ instrument, ticker }] : [];
      } catch (error) {
        if (error instanceof InstrumentFormatError) return [];
        throw error;
      }
    });

    listed.sort(
      (a, b) =>
        a.instrument.baseCurrency.localeCompare(b.instrument.baseCurrency) ||
        a.instrument.id.localeCompare(b.instrument.id),
    );

    listed.forEach(({ instrument }) => catalog.ensure(instrument));
    reconciler.applySnapshot(listed.map(({ ticker }) => ticker));

    const ids = listed.map(({ instrument }) => instrument.id);
    this.listings.set(type, ids);
    logger.info({ type, count: ids.length }, "Product listing refreshed");

    return catalog.snapshot(ids);
  }

  /** Last fetched listing for `type`, without going to the network. */
  getCachedListing(type: InstrumentType): InstrumentSnapshot[] | null {
    const ids = this.listings.get(type);
    return ids ? this.options.catalog.snapshot(ids) : null;
  }
}

export default ProductListingService;
