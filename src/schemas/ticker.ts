import { z } from "zod";

const numericString = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (typeof value === "string" && value.trim().length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a numeric value" });
    return z.NEVER;
  }
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a numeric value" });
    return z.NEVER;
  }
  return parsed;
});

/**
 * One ticker entry as the exchange sends it, over the stream or from the
 * REST market endpoints. Numeric fields arrive as strings. Unknown keys are
 * kept so the change-percent fallback chain can look at them.
 */
export const tickerEntrySchema = z
  .object({
    instId: z.string().min(1),
    last: numericString,
    high24h: numericString.optional(),
    low24h: numericString.optional(),
    open24h: numericString.optional(),
    sodUtc0: numericString.optional(),
    sodUtc8: numericString.optional(),
  })
  .passthrough();

export type TickerEntry = z.infer<typeof tickerEntrySchema>;

export const streamFrameSchema = z
  .object({
    arg: z.object({ channel: z.string(), instId: z.string().optional() }).passthrough().optional(),
    event: z.string().optional(),
    data: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type StreamFrame = z.infer<typeof streamFrameSchema>;

export const restEnvelopeSchema = z.object({
  code: z.string(),
  msg: z.string().optional(),
  data: z.array(z.unknown()),
});

export const exchangeRateEntrySchema = z.object({
  usdCny: numericString,
});
