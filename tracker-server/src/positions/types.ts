import { z } from "zod";
import { InvalidPositionError, UnrecognizedStrategyError } from "../utils/errors.js";

export const STRATEGIES = ["covered_call", "cash_secured_put"] as const;
export type Strategy = (typeof STRATEGIES)[number];

export type PositionStatus = "open" | "closed";

/**
 * A short-option position. Field names are the wire and storage names and
 * stay snake_case.
 */
export interface Position {
  id: string;
  symbol: string;
  strategy: Strategy;
  quantity: number;
  entry_price: number;
  strike_price: number;
  premium_received: number;
  entry_date: Date;
  expiration_date: Date;
  is_open: boolean;
  status: PositionStatus;
  sector?: string;
  notes?: string;
  close_price?: number;
  close_date?: Date;
  profit_loss?: number;
}

export function isStrategy(value: string): value is Strategy {
  return (STRATEGIES as readonly string[]).includes(value);
}

export const positionFieldsSchema = {
  symbol: z.string().min(1).describe("Underlying ticker symbol (e.g. AAPL)"),
  strategy: z.enum(STRATEGIES).describe("covered_call or cash_secured_put"),
  quantity: z.number().int().positive().describe("Number of contracts"),
  entry_price: z.number().nonnegative().describe("Entry price basis"),
  strike_price: z.number().positive().describe("Option strike price"),
  premium_received: z.number().nonnegative().describe("Total premium collected"),
  entry_date: z.coerce.date().describe("Entry timestamp (ISO 8601)"),
  expiration_date: z.coerce.date().describe("Expiration timestamp (ISO 8601)"),
  sector: z.string().min(1).optional().describe("Sector classification"),
  notes: z.string().optional().describe("Free-form notes"),
};

export const createPositionSchema = z.object(positionFieldsSchema);
export type CreatePositionInput = z.infer<typeof createPositionSchema>;

const storedPositionSchema = z.object({
  ...positionFieldsSchema,
  id: z.string().min(1),
  strategy: z.string(),
  is_open: z.boolean(),
  status: z.enum(["open", "closed"]),
  close_price: z.number().nonnegative().optional(),
  close_date: z.coerce.date().optional(),
  profit_loss: z.number().optional(),
});

export function assertDateOrder(entryDate: Date, expirationDate: Date): void {
  if (expirationDate.getTime() < entryDate.getTime()) {
    throw new InvalidPositionError(
      `expiration_date ${expirationDate.toISOString()} is before entry_date ${entryDate.toISOString()}`
    );
  }
}

/**
 * Validates a record read from storage or an external source.
 * Throws UnrecognizedStrategyError for a strategy outside the enumeration.
 */
export function parsePositionRecord(raw: unknown): Position {
  const parsed = storedPositionSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw new InvalidPositionError(`Invalid position record: ${detail}`);
  }

  const { strategy, ...rest } = parsed.data;
  if (!isStrategy(strategy)) {
    throw new UnrecognizedStrategyError(strategy);
  }
  assertDateOrder(rest.entry_date, rest.expiration_date);

  return { ...rest, strategy };
}
