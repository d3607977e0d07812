import { z } from "zod";
import { alertSettingsSchema, instrumentTypeSchema } from "./preferences";

const instrumentIdSchema = z
  .string()
  .trim()
  .min(3, "Instrument id is required")
  .transform((value) => value.toUpperCase());

export const addWatchlistSchema = z.object({
  id: instrumentIdSchema,
  instrumentType: instrumentTypeSchema.optional(),
});

export type AddWatchlistRequest = z.infer<typeof addWatchlistSchema>;

export const reorderWatchlistSchema = z.object({
  ids: z.array(instrumentIdSchema),
});

export type ReorderWatchlistRequest = z.infer<typeof reorderWatchlistSchema>;

export const updateSettingsSchema = z
  .object({
    refreshIntervalSeconds: z.number().int().min(10).max(300).optional(),
    displayedInstrumentId: instrumentIdSchema.optional(),
    alerts: alertSettingsSchema.partial().optional(),
  })
  .refine((value) => Object.values(value).some((entry) => entry !== undefined), {
    message: "At least one setting must be provided",
  });

export type UpdateSettingsRequest = z.infer<typeof updateSettingsSchema>;

export const pricesQuerySchema = z.object({
  currency: z
    .string()
    .optional()
    .transform((value) => (value ?? "USD").toUpperCase())
    .pipe(z.enum(["USD", "CNY"])),
});

export const productsQuerySchema = z.object({
  type: instrumentTypeSchema.default("spot"),
});
