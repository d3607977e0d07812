export class InstrumentFormatError extends Error {
  constructor(readonly instrumentId: string) {
    super(`Instrument id '${instrumentId}' must look like BASE-QUOTE`);
    this.name = "InstrumentFormatError";
  }
}

export class WatchlistOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WatchlistOrderError";
  }
}

export class PersistenceError extends Error {
  constructor(
    readonly key: string,
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}
