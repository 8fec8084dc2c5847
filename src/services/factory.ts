import { Decimal } from "decimal.js";
import type { z } from "zod";
import { formatDecimal } from "./format.js";
import { AMOUNT_DECIMALS } from "../constants.js";
import { MalformedRecordError, UnsupportedTransactionTypeError } from "../errors.js";
import {
  CashTransactionSchema,
  DividendSchema,
  OrderSchema,
  SOURCE_OF_KIND,
  recordReference,
  type RawCashTransaction,
  type RawDividend,
  type RawOrder,
  type RawRecord,
  type RecordSource,
} from "../models/raw.js";
import type { CashTransaction, Transaction } from "../models/transaction.js";

export interface FactoryContext {
  /** Currency for records that do not state one. */
  accountCurrency: string;
}

type CashType = CashTransaction["type"];

const CASH_TYPES = new Map<string, Exclude<CashType, "Dividend">>([
  ["DEPOSIT", "Deposit"],
  ["WITHDRAWAL", "Withdrawal"],
  ["WITHDRAW", "Withdrawal"],
  ["FEE", "Fee"],
  ["INTEREST", "Interest"],
]);

const CASH_NOTES: Record<Exclude<CashType, "Dividend">, string> = {
  Deposit: "Einzahlung auf Verrechnungskonto",
  Withdrawal: "Auszahlung vom Verrechnungskonto",
  Fee: "Gebühr",
  Interest: "Zinsen auf Guthaben",
};

const INFLOW_TYPES: ReadonlySet<CashType> = new Set(["Dividend", "Deposit", "Interest"]);

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(AMOUNT_DECIMALS, Decimal.ROUND_HALF_UP);
}

function malformed(record: RawRecord, reason: string): MalformedRecordError {
  return new MalformedRecordError(SOURCE_OF_KIND[record.kind], recordReference(record), reason);
}

function parseData<S extends z.ZodTypeAny>(schema: S, record: RawRecord): z.output<S> {
  const parsed = schema.safeParse(record.data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw malformed(record, reason);
  }
  return parsed.data;
}

/**
 * Timestamps without a zone designator are taken as UTC; everything is
 * stored as an absolute instant and only zoned again when rendered.
 */
function isCalendarDate(text: string): boolean {
  const match = DATE_PREFIX.exec(text);
  if (!match) return true;
  const [year, month, day] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function parseTimestamp(value: string, record: RawRecord, field: string): Date {
  const trimmed = value.trim();
  let iso = trimmed;
  if (DATE_ONLY.test(trimmed)) {
    iso = `${trimmed}T00:00:00Z`;
  } else if (!ZONE_SUFFIX.test(trimmed)) {
    iso = `${trimmed}Z`;
  }

  const date = new Date(iso);
  if (Number.isNaN(date.getTime()) || !isCalendarDate(trimmed)) {
    throw malformed(record, `${field}: invalid timestamp "${value}"`);
  }
  return date;
}

function signed(type: CashType, magnitude: Decimal): Decimal {
  const abs = magnitude.abs();
  return INFLOW_TYPES.has(type) ? abs : abs.neg();
}

export function fromOrder(record: RawOrder, context: FactoryContext): Transaction {
  const order = parseData(OrderSchema, record);
  if (order.status !== "FILLED") {
    throw malformed(record, `status is ${order.status}, not FILLED`);
  }

  const quantity = order.filledQuantity.abs();
  if (quantity.isZero()) {
    throw malformed(record, "filledQuantity: zero");
  }
  const pricePerUnit = order.fillPrice.abs();

  const executedAt = order.dateExecuted ?? order.dateCreated;
  if (!executedAt) {
    throw malformed(record, "dateExecuted: missing, and no dateCreated either");
  }

  // The API reports sells as negative quantities when no direction is given.
  const side = order.direction ?? (order.filledQuantity.isNegative() ? "SELL" : "BUY");
  const type = side === "BUY" ? "Buy" : "Sell";

  const fees = roundMoney(
    (order.taxes ?? []).reduce((sum, tax) => sum.plus(tax.quantity.abs()), new Decimal(0)),
  );
  const gross = quantity.times(pricePerUnit);
  const amount = roundMoney(type === "Buy" ? gross.plus(fees).neg() : gross.minus(fees));
  const verb = type === "Buy" ? "Kauf" : "Verkauf";

  return Object.freeze({
    type,
    timestamp: parseTimestamp(executedAt, record, order.dateExecuted ? "dateExecuted" : "dateCreated"),
    instrument: order.ticker,
    quantity,
    pricePerUnit,
    amount,
    currency: order.currency ?? context.accountCurrency,
    fees,
    note: `${verb} ${order.ticker} ${formatDecimal(quantity)} Stk @ ${formatDecimal(pricePerUnit)}`,
    source: "orders",
    sequence: record.sequence,
    reference: order.id,
  });
}

export function fromDividend(record: RawDividend, context: FactoryContext): Transaction {
  const dividend = parseData(DividendSchema, record);

  return Object.freeze({
    type: "Dividend",
    timestamp: parseTimestamp(dividend.paidOn, record, "paidOn"),
    instrument: dividend.ticker,
    quantity: null,
    pricePerUnit: null,
    amount: roundMoney(signed("Dividend", dividend.amount)),
    currency: dividend.currency ?? context.accountCurrency,
    fees: new Decimal(0),
    note: `Dividende ${dividend.ticker}`,
    source: "dividends",
    sequence: record.sequence,
    reference: dividend.reference ?? recordReference(record),
  });
}

export function fromCashTransaction(record: RawCashTransaction, context: FactoryContext): Transaction {
  const cash = parseData(CashTransactionSchema, record);
  const reference = cash.reference ?? recordReference(record);

  const type = CASH_TYPES.get(cash.type.toUpperCase());
  if (!type) {
    throw new UnsupportedTransactionTypeError(reference, cash.type);
  }

  const occurredAt = cash.dateTime ?? cash.date;
  if (!occurredAt) {
    throw malformed(record, "dateTime: missing");
  }

  return Object.freeze({
    type,
    timestamp: parseTimestamp(occurredAt, record, cash.dateTime ? "dateTime" : "date"),
    instrument: null,
    quantity: null,
    pricePerUnit: null,
    amount: roundMoney(signed(type, cash.amount)),
    currency: cash.currency ?? context.accountCurrency,
    fees: new Decimal(0),
    note: CASH_NOTES[type],
    source: "transactions",
    sequence: record.sequence,
    reference,
  });
}

export function fromRecord(record: RawRecord, context: FactoryContext): Transaction {
  switch (record.kind) {
    case "order":
      return fromOrder(record, context);
    case "dividend":
      return fromDividend(record, context);
    case "cashTransaction":
      return fromCashTransaction(record, context);
  }
}

export interface RecordFailure {
  source: RecordSource;
  reference: string;
  error: MalformedRecordError | UnsupportedTransactionTypeError;
}

export interface NormalizationResult {
  transactions: Transaction[];
  failures: RecordFailure[];
  /** Orders that never filled (cancelled, rejected, pending). */
  skipped: number;
}

export function normalizeRecords(
  records: readonly RawRecord[],
  context: FactoryContext,
): NormalizationResult {
  const transactions: Transaction[] = [];
  const failures: RecordFailure[] = [];
  let skipped = 0;

  for (const record of records) {
    const status = record.kind === "order" ? record.data.status : undefined;
    if (typeof status === "string" && status !== "FILLED") {
      skipped++;
      continue;
    }

    try {
      transactions.push(fromRecord(record, context));
    } catch (err: unknown) {
      if (err instanceof MalformedRecordError || err instanceof UnsupportedTransactionTypeError) {
        failures.push({ source: SOURCE_OF_KIND[record.kind], reference: err.reference, error: err });
        continue;
      }
      throw err;
    }
  }

  return { transactions, failures, skipped };
}
