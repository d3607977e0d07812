import { Router } from "express";
import type { AppContainer } from "../container";
import { validateQuery } from "../middleware/validateRequest";
import { pricesQuerySchema } from "../schemas/requests";
import { HttpError } from "../utils/HttpError";

export const createPricesRouter = ({ priceSync }: Pick<AppContainer, "priceSync">): Router => {
  const router = Router();

  // Watchlist order
  router.get("/", validateQuery(pricesQuerySchema, ({ currency }, _req, res) => {
    res.json({ currency, data: priceSync.getSnapshot(currency) });
  }));

  router.get("/:id", validateQuery(pricesQuerySchema, ({ currency }, req, res) => {
    const price = priceSync.getPrice(req.params.id, currency);
    if (!price) {
      throw HttpError.notFound("Instrument", req.params.id);
    }
    res.json({ currency, data: price });
  }));

  return router;
};

export default createPricesRouter;
