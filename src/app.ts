import express, { type Express } from "express";
import type { AppContainer } from "./container";
import errorHandler from "./middleware/errorHandler";
import notFoundHandler from "./middleware/notFound";
import requestLogger from "./middleware/requestLogger";
import createConnectionRouter from "./routes/connection";
import createNotificationsRouter from "./routes/notifications";
import createPricesRouter from "./routes/prices";
import createProductsRouter from "./routes/products";
import createSettingsRouter from "./routes/settings";
import createWatchlistRouter from "./routes/watchlist";

export const createApp = (container: AppContainer): Express => {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  // Prevent 404 logs for favicon
  app.get("/favicon.ico", (_req, res) => res.status(204).end());

  app.get("/health", (_req, res) => {
    const { state } = container.priceSync.getStatus();
    res.json({ status: "ok", running: container.priceSync.isRunning(), stream: state });
  });

  app.use("/api/watchlist", createWatchlistRouter(container));
  app.use("/api/prices", createPricesRouter(container));
  app.use("/api/products", createProductsRouter(container));
  app.use("/api/connection", createConnectionRouter(container));
  app.use("/api/settings", createSettingsRouter(container));
  app.use("/api/notifications", createNotificationsRouter(container));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
