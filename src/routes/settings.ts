import { Router } from "express";
import type { AppContainer } from "../container";
import { validateBody } from "../middleware/validateRequest";
import { updateSettingsSchema } from "../schemas/requests";
import type { PriceSyncService } from "../services/PriceSyncService";
import { HttpError } from "../utils/HttpError";

const currentSettings = (priceSync: PriceSyncService) => ({
  refreshIntervalSeconds: priceSync.getRefreshIntervalSeconds(),
  displayedInstrumentId: priceSync.getDisplayedInstrumentId(),
  alerts: priceSync.getAlertSettings(),
});

export const createSettingsRouter = ({ priceSync, watchlist }: Pick<AppContainer, "priceSync" | "watchlist">): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ data: currentSettings(priceSync) });
  });

  router.put("/", validateBody(updateSettingsSchema, async (update, _req, res) => {
    // Checked up front so a rejected request changes nothing.
    if (update.displayedInstrumentId !== undefined && !watchlist.has(update.displayedInstrumentId)) {
      throw new HttpError(400, "Only watchlist instruments can be displayed", { id: update.displayedInstrumentId });
    }

    if (update.displayedInstrumentId !== undefined) {
      await priceSync.setDisplayedInstrument(update.displayedInstrumentId);
    }
    if (update.alerts) {
      await priceSync.updateAlertSettings(update.alerts);
    }
    if (update.refreshIntervalSeconds !== undefined) {
      await priceSync.setRefreshIntervalSeconds(update.refreshIntervalSeconds);
    }

    res.json({ data: currentSettings(priceSync) });
  }));

  return router;
};

export default createSettingsRouter;
