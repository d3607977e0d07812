import { Router, type Request, type Response } from "express";
import type { AppContainer } from "../container";
import { asyncHandler } from "../middleware/validateRequest";

export const createNotificationsRouter = ({ notificationService }: Pick<AppContainer, "notificationService">): Router => {
    const router = Router();

    /**
     * GET /api/notifications/status
     * Whether a webhook is configured
     */
    router.get("/status", (_req: Request, res: Response) => {
        const configured = notificationService.isConfigured();

        res.json({
            configured,
            message: configured
                ? "Price alerts will be delivered"
                : "No webhook URL configured. Set DISCORD_WEBHOOK_URL or WEBHOOK_URL."
        });
    });

    /**
     * POST /api/notifications/test
     * Sends a test message to every configured webhook
     */
    router.post("/test", asyncHandler(async (_req: Request, res: Response) => {
        const result = await notificationService.sendTestNotification();

        if (result.success) {
            res.json({ success: true, message: result.message });
        } else {
            res.status(400).json({ success: false, message: result.message });
        }
    }));

    return router;
};

export default createNotificationsRouter;
