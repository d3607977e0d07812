import { Router } from "express";
import type { AppContainer } from "../container";

export const createConnectionRouter = ({ priceSync }: Pick<AppContainer, "priceSync">): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ data: priceSync.getStatus() });
  });

  // Also the only way out of "failed".
  router.post("/reconnect", (_req, res) => {
    priceSync.reconnect();
    const { state, retryCount } = priceSync.getStatus();
    res.status(202).json({ data: { state, retryCount } });
  });

  return router;
};

export default createConnectionRouter;
