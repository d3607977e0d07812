import env, { type EnvConfig } from "./config/env";
import FileKeyValueStore from "./persistence/FileKeyValueStore";
import type { KeyValueStore } from "./persistence/KeyValueStore";
import LmdbKeyValueStore from "./persistence/LmdbKeyValueStore";
import PreferencesRepository from "./persistence/PreferencesRepository";
import ExchangeRateService from "./services/ExchangeRateService";
import ExchangeRestClient, { type FetchLike } from "./services/ExchangeRestClient";
import NotificationService from "./services/NotificationService";
import PollingFallback from "./services/PollingFallback";
import PriceSyncService from "./services/PriceSyncService";
import ProductCatalog from "./services/ProductCatalog";
import ProductListingService from "./services/ProductListingService";
import StreamConnection from "./services/StreamConnection";
import SubscriptionManager from "./services/SubscriptionManager";
import type { SocketFactory } from "./services/TickerSocket";
import UpdateReconciler from "./services/UpdateReconciler";
import WatchlistStore from "./services/WatchlistStore";
import type { AlertSettings } from "./types";

export interface AppContainer {
  config: EnvConfig;
  store: KeyValueStore;
  repository: PreferencesRepository;
  catalog: ProductCatalog;
  watchlist: WatchlistStore;
  connection: StreamConnection;
  subscriptions: SubscriptionManager;
  reconciler: UpdateReconciler;
  restClient: ExchangeRestClient;
  polling: PollingFallback;
  exchangeRates: ExchangeRateService;
  productListing: ProductListingService;
  priceSync: PriceSyncService;
  notificationService: NotificationService;
}

export interface ContainerOptions {
  config?: Partial<EnvConfig>;
  /** Replaces the store picked from `preferencesBackend`. */
  store?: KeyValueStore;
  createSocket?: SocketFactory;
  fetch?: FetchLike;
}

const buildStore = (config: EnvConfig): KeyValueStore =>
  config.preferencesBackend === "file"
    ? new FileKeyValueStore(config.preferencesStorePath)
    : new LmdbKeyValueStore(config.preferencesStorePath);

/** Builds a fully wired engine. Nothing is started or opened here. */
export const createContainer = (options: ContainerOptions = {}): AppContainer => {
  const config: EnvConfig = { ...env, ...options.config };
  const store = options.store ?? buildStore(config);
  const repository = new PreferencesRepository(store);
  const catalog = new ProductCatalog();

  const watchlist = new WatchlistStore({ repository, catalog, defaults: config.defaultWatchlist });

  const connection = new StreamConnection({
    url: config.exchangeWsUrl,
    createSocket: options.createSocket,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    reconnectBaseDelayMs: config.reconnectBaseDelayMs,
    maxReconnectAttempts: config.maxReconnectAttempts,
  });

  const subscriptions = new SubscriptionManager({ connection, watchlist });

  // The reconciler reads display and alert state owned by the service below.
  const reconciler = new UpdateReconciler({
    catalog,
    subscriptions,
    watchlist,
    getDisplayedInstrumentId: (): string | null => priceSync.getDisplayedInstrumentId(),
    getAlertSettings: (): AlertSettings => priceSync.getAlertSettings(),
  });

  const restClient = new ExchangeRestClient({
    baseUrl: config.exchangeRestUrl,
    timeoutMs: config.restTimeoutMs,
    fetch: options.fetch,
  });

  const polling = new PollingFallback({
    client: restClient,
    reconciler,
    catalog,
    watchlist,
    connection,
    repository,
    intervalSeconds: config.refreshIntervalSeconds,
  });

  const exchangeRates = new ExchangeRateService({ client: restClient, repository });
  const productListing = new ProductListingService({ client: restClient, catalog, reconciler });

  const priceSync: PriceSyncService = new PriceSyncService({
    repository,
    catalog,
    watchlist,
    connection,
    subscriptions,
    reconciler,
    polling,
    exchangeRates,
    defaultRefreshIntervalSeconds: config.refreshIntervalSeconds,
  });

  const notificationService = new NotificationService({
    discordWebhookUrl: config.notificationsEnabled ? config.discordWebhookUrl : "",
    webhookUrl: config.notificationsEnabled ? config.webhookUrl : "",
    engine: priceSync,
    alertCooldownMs: config.alertCooldownMs,
    fetch: options.fetch,
  });

  return {
    config,
    store,
    repository,
    catalog,
    watchlist,
    connection,
    subscriptions,
    reconciler,
    restClient,
    polling,
    exchangeRates,
    productListing,
    priceSync,
    notificationService,
  };
};

export default createContainer;
