import type { EventEmitter } from "events";
import type { ConnectionFailedEvent } from "./PriceSyncService";
import type { PriceChangeMode, SignificantChangeEvent } from "../types";
import logger from "../utils/logger";
import type { FetchLike } from "./ExchangeRestClient";

export interface NotificationServiceOptions {
    discordWebhookUrl?: string;
    webhookUrl?: string;
    /** Event source emitting `significant-change` and `connection-failed`. */
    engine?: EventEmitter;
    alertCooldownMs?: number;
    batchDelayMs?: number;
    fetch?: FetchLike;
    now?: () => number;
}

interface DiscordEmbed {
    title: string;
    description?: string;
    color: number;
    fields?: { name: string; value: string; inline?: boolean }[];
    timestamp?: string;
    footer?: { text: string };
}

interface DiscordWebhookPayload {
    username?: string;
    content?: string;
    embeds?: DiscordEmbed[];
}

const COLORS = {
    UP: 0x22c55e,
    DOWN: 0xef4444,
    WARNING: 0xeab308,
    INFO: 0x3b82f6,
};

const MODE_LABELS: Record<PriceChangeMode, string> = {
    hours24: "24h",
    todayUtc: "since 00:00 UTC",
    todayLocal: "since 00:00 UTC+8",
};

const BOT_NAME = "Ticker Sync";

const formatPrice = (price: number): string => {
    if (price >= 1) return price.toFixed(2);
    return price.toPrecision(4);
};

/**
 * Delivers engine alerts to Discord and/or a generic webhook.
 *
 * Listens for:
 * - `significant-change`, at most once per instrument per cooldown
 * - `connection-failed`, sent immediately
 */
export class NotificationService {
    private readonly discordWebhookUrl: string;
    private readonly webhookUrl: string;
    private readonly alertCooldownMs: number;
    private readonly batchDelayMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly now: () => number;
    private readonly lastAlertAt = new Map<string, number>();
    private pendingNotifications: DiscordWebhookPayload[] = [];
    private batchTimeout: ReturnType<typeof setTimeout> | null = null;

    constructor(options: NotificationServiceOptions) {
        this.discordWebhookUrl = options.discordWebhookUrl ?? "";
        this.webhookUrl = options.webhookUrl ?? "";
        this.alertCooldownMs = options.alertCooldownMs ?? 5 * 60 * 1000;
        this.batchDelayMs = options.batchDelayMs ?? 1000;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.now = options.now ?? Date.now;

        if (options.engine) {
            options.engine.on("significant-change", (event: SignificantChangeEvent) => {
                this.notifySignificantChange(event);
            });
            options.engine.on("connection-failed", (event: ConnectionFailedEvent) => {
                void this.notifyConnectionFailed(event);
            });
        }

        logger.info({
            discordConfigured: !!this.discordWebhookUrl,
            webhookConfigured: !!this.webhookUrl,
        }, "NotificationService initialized");
    }

    isConfigured(): boolean {
        return !!(this.discordWebhookUrl || this.webhookUrl);
    }

    async sendTestNotification(): Promise<{ success: boolean; message: string }> {
        if (!this.isConfigured()) {
            return { success: false, message: "No webhook URL configured" };
        }

        const embed: DiscordEmbed = {
            title: "🧪 Test Notification",
            description: "If you see this, price alerts are working.",
            color: COLORS.INFO,
            timestamp: new Date(this.now()).toISOString(),
            footer: { text: BOT_NAME },
        };

        const failures = await this.sendPayload({ username: BOT_NAME, embeds: [embed] });
        return failures === 0
            ? { success: true, message: "Test notification sent successfully" }
            : { success: false, message: `${failures} webhook request(s) failed` };
    }

    /**
     * Queues an alert unless the same instrument alerted within the cooldown.
     * Returns whether it was queued.
     */
    notifySignificantChange(event: SignificantChangeEvent): boolean {
        if (!this.isConfigured()) {
            return false;
        }

        const id = event.instrument.id;
        const now = this.now();
        const last = this.lastAlertAt.get(id);
        if (last !== undefined && now - last < this.alertCooldownMs) {
            logger.debug({ instId: id }, "Alert suppressed by cooldown");
            return false;
        }
        this.lastAlertAt.set(id, now);

        const rising = event.percentChange >= 0;
        const percent = `${rising ? "+" : ""}${event.percentChange.toFixed(2)}%`;

        const embed: DiscordEmbed = {
            title: `${rising ? "📈" : "📉"} ${event.instrument.baseCurrency} ${percent}`,
            description: `**${id}** moved ${percent} ${MODE_LABELS[event.mode]}`,
            color: rising ? COLORS.UP : COLORS.DOWN,
            fields: [
                { name: "Previous", value: formatPrice(event.oldPrice), inline: true },
                { name: "Current", value: formatPrice(event.newPrice), inline: true },
                { name: "Quote", value: event.instrument.quoteCurrency, inline: true },
            ],
            timestamp: new Date(now).toISOString(),
            footer: { text: BOT_NAME },
        };

        this.queueNotification({ embeds: [embed] });
        return true;
    }

    /** Sent right away, outside the batch. */
    async notifyConnectionFailed(event: ConnectionFailedEvent): Promise<void> {
        if (!this.isConfigured()) {
            return;
        }

        const embed: DiscordEmbed = {
            title: "⚠️ Price stream unavailable",
            description: "Automatic reconnection gave up. Prices continue from polling until a manual reconnect.",
            color: COLORS.WARNING,
            fields: [{ name: "Attempts", value: event.attempts.toString(), inline: true }],
            timestamp: new Date(this.now()).toISOString(),
            footer: { text: BOT_NAME },
        };

        await this.sendPayload({ username: BOT_NAME, embeds: [embed] });
    }

    /** Sends whatever is still queued; used on shutdown. */
    async flush(): Promise<void> {
        if (this.batchTimeout) {
            clearTimeout(this.batchTimeout);
            this.batchTimeout = null;
        }
        await this.flushNotifications();
    }

    private queueNotification(payload: DiscordWebhookPayload): void {
        this.pendingNotifications.push(payload);

        if (this.batchTimeout) {
            clearTimeout(this.batchTimeout);
        }

        this.batchTimeout = setTimeout(() => {
            this.batchTimeout = null;
            void this.flushNotifications();
        }, this.batchDelayMs);
    }

    private async flushNotifications(): Promise<void> {
        if (this.pendingNotifications.length === 0) {
            return;
        }

        const notifications = [...this.pendingNotifications];
        this.pendingNotifications = [];

        const allEmbeds = notifications.flatMap((notification) => notification.embeds ?? []);

        // Discord accepts at most 10 embeds per message
        for (let i = 0; i < allEmbeds.length; i += 10) {
            await this.sendPayload({
                username: BOT_NAME,
                embeds: allEmbeds.slice(i, i + 10),
            });
        }
    }

    /** Returns the number of webhooks that did not accept the payload. */
    private async sendPayload(payload: DiscordWebhookPayload): Promise<number> {
        const urls = [this.discordWebhookUrl, this.webhookUrl].filter((url) => url.length > 0);
        let failures = 0;

        for (const url of urls) {
            try {
                const response = await this.fetchImpl(url, {
                    method: "POST",
                    headers: { "Content-Type": "application/json" },
                    body: JSON.stringify(payload),
                });

                if (!response.ok) {
                    failures++;
                    const text = await response.text();
                    logger.error({ url, status: response.status, body: text }, "Webhook request failed");
                } else {
                    logger.debug({ url }, "Notification sent successfully");
                }
            } catch (error) {
                failures++;
                logger.error({ err: error, url }, "Failed to send notification");
            }
        }

        return failures;
    }
}

export default NotificationService;
