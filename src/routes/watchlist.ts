import { Router } from "express";
import type { AppContainer } from "../container";
import { asyncHandler, validateBody, validateQuery } from "../middleware/validateRequest";
import { addWatchlistSchema, pricesQuerySchema, reorderWatchlistSchema } from "../schemas/requests";
import { HttpError } from "../utils/HttpError";

export const createWatchlistRouter = ({ watchlist, priceSync }: Pick<AppContainer, "watchlist" | "priceSync">): Router => {
  const router = Router();

  router.get("/", validateQuery(pricesQuerySchema, ({ currency }, _req, res) => {
    res.json({
      data: {
        ids: watchlist.getIds(),
        displayedInstrumentId: priceSync.getDisplayedInstrumentId(),
        items: priceSync.getSnapshot(currency),
      },
    });
  }));

  router.post("/", validateBody(addWatchlistSchema, async (body, _req, res) => {
    const added = await watchlist.add(body);
    if (!added) {
      throw HttpError.conflict(`'${body.id}' is already in the watchlist`, { id: body.id });
    }
    res.status(201).json({ data: priceSync.getPrice(body.id) });
  }));

  router.put("/order", validateBody(reorderWatchlistSchema, async ({ ids }, _req, res) => {
    await watchlist.reorder(ids);
    res.json({ data: { ids: watchlist.getIds() } });
  }));

  router.delete("/:id", asyncHandler(async (req, res) => {
    const removed = await watchlist.remove(req.params.id);
    if (!removed) {
      throw HttpError.notFound("Instrument", req.params.id);
    }
    res.status(204).end();
  }));

  return router;
};

export default createWatchlistRouter;
