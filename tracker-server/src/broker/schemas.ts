import { z } from "zod";

/** Alpaca serializes numeric fields as strings. */
const decimal = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === "number" ? value : parseFloat(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

export const brokerAccountSchema = z.object({
  id: z.string(),
  status: z.string(),
  buying_power: decimal,
  cash: decimal,
  portfolio_value: decimal,
  equity: decimal,
  options_buying_power: decimal.optional(),
  options_trading_level: z.number().optional(),
});
export type BrokerAccount = z.infer<typeof brokerAccountSchema>;

export const brokerPositionSchema = z.object({
  symbol: z.string(),
  qty: decimal,
  avg_entry_price: decimal,
  asset_class: z.string().optional(),
  side: z.string().optional(),
  current_price: decimal.optional(),
});
export type BrokerPosition = z.infer<typeof brokerPositionSchema>;

export const brokerPositionsSchema = z.array(brokerPositionSchema);

export const latestTradeSchema = z.object({
  Price: z.number(),
  Timestamp: z.string().optional(),
});
export type LatestTrade = z.infer<typeof latestTradeSchema>;
