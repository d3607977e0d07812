import { Router } from "express";
import type { AppContainer } from "../container";
import { validateQuery } from "../middleware/validateRequest";
import { productsQuerySchema } from "../schemas/requests";
import { HttpError } from "../utils/HttpError";
import logger from "../utils/logger";

export const createProductsRouter = ({ productListing }: Pick<AppContainer, "productListing">): Router => {
  const router = Router();

  /**
   * GET /api/products?type=spot
   * Every dollar-quoted instrument of one type, straight from the exchange.
   * Serves the last listing, flagged stale, when the exchange is unreachable.
   */
  router.get("/", validateQuery(productsQuerySchema, async ({ type }, _req, res) => {
    try {
      const data = await productListing.fetchListing(type);
      res.json({ type, stale: false, data });
    } catch (error) {
      const cached = productListing.getCachedListing(type);
      if (!cached) {
        throw new HttpError(502, "Product listing is unavailable", { type });
      }
      logger.warn({ err: error, type }, "Serving cached product listing");
      res.json({ type, stale: true, data: cached });
    }
  }));

  return router;
};

export default createProductsRouter;
