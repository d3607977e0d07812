import type { ConnectionState } from "../types";
import logger from "../utils/logger";

export interface SubscriptionTransport {
  isConnected(): boolean;
  send(payload: unknown): Promise<void>;
}

export interface WatchlistView {
  has(id: string): boolean;
  getIds(): string[];
}

export interface SubscriptionManagerOptions {
  connection: SubscriptionTransport;
  watchlist: WatchlistView;
  batchSize?: number;
  batchDelayMs?: number;
  batchGapMs?: number;
}

type SubscriptionOp = "subscribe" | "unsubscribe";

export const buildSubscriptionMessage = (op: SubscriptionOp, instId: string) => ({
  op,
  args: [{ channel: "tickers", instId }],
});

const settle = (): void => undefined;

/**
 * Keeps the stream's ticker subscriptions in line with the watchlist.
 *
 * Requests for one instrument are chained, so a subscribe and an unsubscribe
 * for the same id are never on the wire at the same time.
 */
export class SubscriptionManager {
  private readonly connection: SubscriptionTransport;
  private readonly watchlist: WatchlistView;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly batchGapMs: number;

  private readonly subscriptions = new Set<string>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private pendingBatch: string[] = [];
  private batchTimer?: NodeJS.Timeout;
  // Bumped by reset() so late completions from a dead session are ignored.
  private generation = 0;

  constructor(options: SubscriptionManagerOptions) {
    this.connection = options.connection;
    this.watchlist = options.watchlist;
    this.batchSize = options.batchSize ?? 5;
    this.batchDelayMs = options.batchDelayMs ?? 2000;
    this.batchGapMs = options.batchGapMs ?? 200;
  }

  getSubscriptions(): string[] {
    return [...this.subscriptions];
  }

  isSubscribed(id: string): boolean {
    return this.subscriptions.has(id);
  }

  getPendingBatch(): string[] {
    return [...this.pendingBatch];
  }

  /**
   * Unsubscribes everything no longer wanted right away and subscribes the
   * rest, the first `batchSize` immediately and the remainder spaced out
   * after `batchDelayMs`. Resolves once the immediate requests settle.
   */
  async reconcile(watchlistIds: readonly string[], connectionState: ConnectionState): Promise<void> {
    const wanted = new Set(watchlistIds);
    const connected = connectionState === "connected" && this.connection.isConnected();

    this.pendingBatch = this.pendingBatch.filter((id) => wanted.has(id));

    const toUnsubscribe = [...this.subscriptions].filter((id) => !wanted.has(id));
    const toSubscribe = watchlistIds.filter((id) => !this.subscriptions.has(id) && !this.pendingBatch.includes(id));

    const requests: Promise<boolean>[] = toUnsubscribe.map((id) => this.release(id));

    if (wanted.size === 0) {
      this.cancelBatch();
      await Promise.all(requests);
      return;
    }

    if (!connected) {
      // Recorded only; restore() re-sends the whole set once the stream is up.
      toSubscribe.forEach((id) => this.subscriptions.add(id));
      await Promise.all(requests);
      return;
    }

    const immediate = toSubscribe.slice(0, this.batchSize);
    const deferred = toSubscribe.slice(this.batchSize);

    requests.push(...immediate.map((id) => this.subscribe(id)));

    if (deferred.length > 0) {
      this.pendingBatch.push(...deferred);
      logger.debug({ immediate: immediate.length, deferred: deferred.length }, "Deferring subscriptions");
      if (!this.batchTimer) {
        this.batchTimer = setTimeout(() => this.drainBatch(), this.batchDelayMs);
      }
    }

    await Promise.all(requests);
  }

  /** No-op when already subscribed. A failed request rolls the local entry back. */
  async subscribe(id: string): Promise<boolean> {
    if (this.subscriptions.has(id)) {
      return false;
    }

    this.subscriptions.add(id);
    if (!this.connection.isConnected()) {
      return true;
    }

    const generation = this.generation;
    try {
      await this.enqueue(id, "subscribe");
      return true;
    } catch (error) {
      if (generation === this.generation) {
        this.subscriptions.delete(id);
      }
      logger.warn({ err: error, instId: id }, "Subscribe request failed");
      return false;
    }
  }

  /** Never unsubscribes an instrument that is still in the watchlist. */
  async unsubscribe(id: string): Promise<boolean> {
    if (this.watchlist.has(id)) {
      return false;
    }
    return this.release(id);
  }

  /** Full re-subscribe for a fresh session; the server remembers nothing. */
  async restore(): Promise<void> {
    this.reset();
    const ids = this.watchlist.getIds();
    logger.info({ count: ids.length }, "Restoring subscriptions");
    await this.reconcile(ids, "connected");
  }

  /** Forgets the local view, e.g. when the session is gone. */
  reset(): void {
    this.generation++;
    this.subscriptions.clear();
    this.inFlight.clear();
    this.cancelBatch();
  }

  private async release(id: string): Promise<boolean> {
    if (!this.subscriptions.has(id)) {
      return false;
    }

    this.subscriptions.delete(id);
    if (!this.connection.isConnected()) {
      return true;
    }

    try {
      await this.enqueue(id, "unsubscribe");
    } catch (error) {
      // Stray frames for it are dropped by the reconciler's subscription filter.
      logger.warn({ err: error, instId: id }, "Unsubscribe request failed");
    }
    return true;
  }

  private enqueue(id: string, op: SubscriptionOp): Promise<void> {
    const previous = this.inFlight.get(id);
    const send = () => this.connection.send(buildSubscriptionMessage(op, id));
    const request = previous ? previous.then(send) : send();

    const gate: Promise<void> = request.then(settle, settle).then(() => {
      if (this.inFlight.get(id) === gate) {
        this.inFlight.delete(id);
      }
    });
    this.inFlight.set(id, gate);
    return request;
  }

  private drainBatch(): void {
    this.batchTimer = undefined;
    const next = this.pendingBatch.shift();
    if (!next) {
      return;
    }

    if (this.watchlist.has(next)) {
      void this.subscribe(next);
    }

    if (this.pendingBatch.length > 0) {
      this.batchTimer = setTimeout(() => this.drainBatch(), this.batchGapMs);
    }
  }

  private cancelBatch(): void {
    if (this.batchTimer) {
      clearTimeout(this.batchTimer);
      this.batchTimer = undefined;
    }
    this.pendingBatch = [];
  }
}

export default SubscriptionManager;
