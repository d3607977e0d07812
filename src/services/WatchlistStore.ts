import { EventEmitter } from "events";
import { InstrumentFormatError, PersistenceError, WatchlistOrderError } from "../errors";
import type { PreferencesRepository } from "../persistence/PreferencesRepository";
import { toMarketState, toMarketStateRecord } from "../persistence/PreferencesRepository";
import type { WatchlistRecord } from "../schemas/preferences";
import type { Instrument, InstrumentType } from "../types";
import logger from "../utils/logger";
import { createInstrument, type ProductCatalog } from "./ProductCatalog";

export const DEFAULT_WATCHLIST: readonly string[] = ["BTC-USDT", "ETH-USDT"];

export interface WatchlistAddInput {
  id: string;
  instrumentType?: InstrumentType;
}

export interface TypeCorrection {
  id: string;
  storedType: InstrumentType;
  resolvedType: InstrumentType;
}

export interface WatchlistLoadResult {
  ids: string[];
  corrections: TypeCorrection[];
  seeded: boolean;
}

export interface WatchlistStoreOptions {
  repository: PreferencesRepository;
  catalog: ProductCatalog;
  defaults?: readonly string[];
}

const toPersistenceError = (error: unknown): PersistenceError =>
  error instanceof PersistenceError ? error : new PersistenceError("watchlist", "Failed to save watchlist", error);

const isWellFormed = (id: string): boolean => {
  try {
    createInstrument(id);
    return true;
  } catch (error) {
    logger.warn({ id, err: error }, "Ignoring malformed default instrument");
    return false;
  }
};

/**
 * Ordered, duplicate-free list of favorited instruments.
 *
 * Events (each fires after the mutation has been written):
 * - `added` (Instrument)
 * - `removed` (id)
 * - `reordered` (ids)
 * - `reset` (ids)
 * - `type-corrected` (TypeCorrection)
 * - `persistence-error` (PersistenceError), in-memory state is kept
 */
export class WatchlistStore extends EventEmitter {
  private readonly repository: PreferencesRepository;
  private readonly catalog: ProductCatalog;
  private readonly defaults: readonly string[];

  private ids: string[] = [];
  private writeTail: Promise<void> = Promise.resolve();

  constructor(options: WatchlistStoreOptions) {
    super();
    this.repository = options.repository;
    this.catalog = options.catalog;
    const defaults = (options.defaults ?? []).filter(isWellFormed);
    this.defaults = defaults.length > 0 ? defaults : DEFAULT_WATCHLIST;
  }

  async load(): Promise<WatchlistLoadResult> {
    let records: WatchlistRecord[] | null = null;
    try {
      records = this.repository.loadWatchlist();
    } catch (error) {
      this.emitPersistenceError(toPersistenceError(error));
    }

    const corrections: TypeCorrection[] = [];
    const ids: string[] = [];
    let dirty = false;

    for (const record of records ?? []) {
      let instrument: Instrument;
      try {
        instrument = createInstrument(record.id);
      } catch (error) {
        if (!(error instanceof InstrumentFormatError)) throw error;
        logger.warn({ id: record.id }, "Dropping malformed watchlist entry");
        dirty = true;
        continue;
      }

      if (ids.includes(instrument.id)) {
        dirty = true;
        continue;
      }

      if (record.instrumentType !== instrument.instrumentType) {
        dirty = true;
        if (record.instrumentType) {
          corrections.push({ id: instrument.id, storedType: record.instrumentType, resolvedType: instrument.instrumentType });
        }
      }

      this.catalog.ensure(instrument);
      if (record.state) {
        this.catalog.restore(instrument.id, toMarketState(record.state));
      }
      ids.push(instrument.id);
    }

    let seeded = false;
    if (ids.length === 0) {
      this.defaults.forEach((id) => {
        const instrument = createInstrument(id);
        this.catalog.ensure(instrument);
        ids.push(instrument.id);
      });
      seeded = true;
      dirty = true;
    }

    this.ids = ids;

    if (dirty) {
      await this.persist();
    }

    corrections.forEach((correction) => {
      logger.warn(correction, "Corrected stored instrument type");
      this.emit("type-corrected", correction);
    });

    logger.info({ count: ids.length, seeded, corrections: corrections.length }, "Watchlist loaded");
    return { ids: [...ids], corrections, seeded };
  }

  /**
   * Appends the instrument unless it is already present. The type is always
   * derived from the id; a caller-supplied type that disagrees is reported
   * through `type-corrected`.
   */
  async add(input: WatchlistAddInput): Promise<boolean> {
    const instrument = createInstrument(input.id);
    if (this.ids.includes(instrument.id)) {
      return false;
    }

    this.catalog.ensure(instrument);
    this.ids.push(instrument.id);
    await this.persist();

    if (input.instrumentType && input.instrumentType !== instrument.instrumentType) {
      const correction: TypeCorrection = {
        id: instrument.id,
        storedType: input.instrumentType,
        resolvedType: instrument.instrumentType,
      };
      logger.warn(correction, "Caller supplied a mismatched instrument type");
      this.emit("type-corrected", correction);
    }

    this.emit("added", instrument);
    return true;
  }

  async remove(id: string): Promise<boolean> {
    const normalized = id.trim().toUpperCase();
    const index = this.ids.indexOf(normalized);
    if (index === -1) {
      return false;
    }

    this.ids.splice(index, 1);
    await this.persist();
    this.emit("removed", normalized);
    return true;
  }

  /** Rejects anything but a permutation of the current ids; the store is left as it was. */
  async reorder(newOrder: readonly string[]): Promise<void> {
    const normalized = newOrder.map((id) => id.trim().toUpperCase());
    const unique = new Set(normalized);

    if (normalized.length !== this.ids.length || unique.size !== normalized.length) {
      throw new WatchlistOrderError(`Expected ${this.ids.length} distinct ids, received ${normalized.length}`);
    }

    const unknown = normalized.filter((id) => !this.ids.includes(id));
    if (unknown.length > 0) {
      throw new WatchlistOrderError(`Not in the watchlist: ${unknown.join(", ")}`);
    }

    this.ids = normalized;
    await this.persist();
    this.emit("reordered", [...this.ids]);
  }

  /** Drops every entry and goes back to the default pair. */
  async reset(): Promise<void> {
    this.ids = this.defaults.map((id) => {
      const instrument = createInstrument(id);
      this.catalog.ensure(instrument);
      return instrument.id;
    });
    await this.persist();
    this.emit("reset", [...this.ids]);
  }

  getIds(): string[] {
    return [...this.ids];
  }

  has(id: string): boolean {
    return this.ids.includes(id);
  }

  getInstruments(): Instrument[] {
    return this.catalog.snapshot(this.ids).map(({ id, baseCurrency, quoteCurrency, instrumentType }) => ({
      id,
      baseCurrency,
      quoteCurrency,
      instrumentType,
    }));
  }

  /** Saves with the latest known prices so they survive a restart. */
  async saveSnapshot(): Promise<void> {
    await this.persist();
  }

  private persist(): Promise<void> {
    const states = this.catalog.marketStates(this.ids);
    const records: WatchlistRecord[] = this.ids.map((id) => {
      const state = states.get(id);
      return {
        id,
        instrumentType: createInstrument(id).instrumentType,
        ...(state && state.currentPrice > 0 ? { state: toMarketStateRecord(state) } : {}),
      };
    });

    this.writeTail = this.writeTail.then(async () => {
      try {
        await this.repository.saveWatchlist(records);
      } catch (error) {
        this.emitPersistenceError(toPersistenceError(error));
      }
    });
    return this.writeTail;
  }

  private emitPersistenceError(error: PersistenceError): void {
    logger.error({ err: error, key: error.key }, "Watchlist persistence failed");
    this.emit("persistence-error", error);
  }
}

export default WatchlistStore;
