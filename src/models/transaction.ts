import type { Decimal } from "decimal.js";
import type { RecordSource } from "./raw.js";

export type TransactionType =
  | "Buy"
  | "Sell"
  | "Dividend"
  | "Deposit"
  | "Withdrawal"
  | "Fee"
  | "Interest";

interface TransactionBase {
  type: TransactionType;
  /** UTC instant of execution or settlement. */
  timestamp: Date;
  instrument: string | null;
  /** Signed net cash effect: outflow negative, inflow positive. */
  amount: Decimal;
  currency: string;
  fees: Decimal;
  note: string;
  source: RecordSource;
  /** Position of the raw record within its endpoint's fetch order. */
  sequence: number;
  reference: string;
}

export interface TradeTransaction extends TransactionBase {
  type: "Buy" | "Sell";
  instrument: string;
  quantity: Decimal;
  pricePerUnit: Decimal;
}

export interface CashTransaction extends TransactionBase {
  type: Exclude<TransactionType, "Buy" | "Sell">;
  quantity: null;
  pricePerUnit: null;
}

export type Transaction = Readonly<TradeTransaction> | Readonly<CashTransaction>;

export const BOOKING_TEXT: Record<TransactionType, string> = {
  Buy: "Wertpapierkauf",
  Sell: "Wertpapierverkauf",
  Dividend: "Dividende",
  Deposit: "Einlage",
  Withdrawal: "Auszahlung",
  Fee: "Gebühr",
  Interest: "Zinsen",
};
