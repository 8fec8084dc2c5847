import { Decimal } from "decimal.js";
import { z } from "zod";

export type RecordSource = "orders" | "dividends" | "transactions";

/** Source endpoint order, used as a sort tie-breaker. */
export const SOURCE_ORDER: readonly RecordSource[] = ["orders", "dividends", "transactions"];

type RawData = Record<string, unknown>;

export interface RawOrder {
  kind: "order";
  sequence: number;
  data: RawData;
}

export interface RawDividend {
  kind: "dividend";
  sequence: number;
  data: RawData;
}

export interface RawCashTransaction {
  kind: "cashTransaction";
  sequence: number;
  data: RawData;
}

export type RawRecord = RawOrder | RawDividend | RawCashTransaction;
export type RawRecordKind = RawRecord["kind"];

export const SOURCE_OF_KIND: Record<RawRecordKind, RecordSource> = {
  order: "orders",
  dividend: "dividends",
  cashTransaction: "transactions",
};

export function recordReference(record: RawRecord): string {
  const { id, reference } = record.data;
  for (const candidate of [id, reference]) {
    if (typeof candidate === "string" && candidate !== "") return candidate;
    if (typeof candidate === "number") return String(candidate);
  }
  return `#${record.sequence}`;
}

const decimal = z
  .union([z.number().finite(), z.string().trim().regex(/^[+-]?\d+(\.\d+)?$/, "not a decimal number")])
  .transform((value) => new Decimal(value));

const currency = z.string().regex(/^[A-Z]{3}$/, "not an ISO currency code");

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

export const PageSchema = z.object({
  items: z.array(z.record(z.unknown())),
  nextPagePath: z.string().nullish(),
});

export const OrderSchema = z.object({
  id: identifier,
  status: z.string(),
  ticker: z.string().min(1),
  direction: z.enum(["BUY", "SELL"]).optional(),
  filledQuantity: decimal,
  fillPrice: decimal,
  dateExecuted: z.string().nullish(),
  dateCreated: z.string().nullish(),
  taxes: z.array(z.object({ quantity: decimal })).nullish(),
  currency: currency.optional(),
});

export const DividendSchema = z.object({
  reference: identifier.optional(),
  ticker: z.string().min(1),
  amount: decimal,
  paidOn: z.string().min(1),
  currency: currency.optional(),
});

export const CashTransactionSchema = z.object({
  reference: identifier.optional(),
  type: z.string().min(1),
  amount: decimal,
  dateTime: z.string().nullish(),
  date: z.string().nullish(),
  currency: currency.optional(),
});

export type OrderData = z.infer<typeof OrderSchema>;
export type DividendData = z.infer<typeof DividendSchema>;
export type CashTransactionData = z.infer<typeof CashTransactionSchema>;
export type Page = z.infer<typeof PageSchema>;
