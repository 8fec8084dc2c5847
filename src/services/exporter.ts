import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatDate, formatDecimal } from "./format.js";
import { AMOUNT_DECIMALS } from "../constants.js";
import { ExportError } from "../errors.js";
import { SOURCE_ORDER } from "../models/raw.js";
import { BOOKING_TEXT, type Transaction } from "../models/transaction.js";

/** date, type, instrument, quantity, price, amount, currency, fees, note */
export const CSV_HEADER = [
  "Buchungsdatum",
  "Buchungstext",
  "Wertpapier",
  "Stückzahl",
  "Kurs",
  "Betrag",
  "Währung",
  "Gebühren",
  "Verwendungszweck",
] as const;

const DELIMITER = ";";
const LINE_END = "\r\n";
const BOM = "\uFEFF";

export interface ExportOptions {
  timeZone: string;
}

export function compareTransactions(a: Transaction, b: Transaction): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime() ||
    SOURCE_ORDER.indexOf(a.source) - SOURCE_ORDER.indexOf(b.source) ||
    a.sequence - b.sequence
  );
}

export function sortTransactions(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort(compareTransactions);
}

export function escapeField(value: string): string {
  if (!/[;"\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function renderRow(tx: Transaction, timeZone: string): string {
  return [
    formatDate(tx.timestamp, timeZone),
    BOOKING_TEXT[tx.type],
    tx.instrument ?? "",
    tx.quantity ? formatDecimal(tx.quantity) : "",
    tx.pricePerUnit ? formatDecimal(tx.pricePerUnit) : "",
    formatDecimal(tx.amount, AMOUNT_DECIMALS),
    tx.currency,
    formatDecimal(tx.fees, AMOUNT_DECIMALS),
    tx.note,
  ]
    .map(escapeField)
    .join(DELIMITER);
}

/** The whole file: BOM, header and one CRLF-terminated line per transaction, in the given order. */
export function renderCsv(transactions: readonly Transaction[], timeZone: string): string {
  const lines = [CSV_HEADER.join(DELIMITER)];
  for (const tx of transactions) {
    lines.push(renderRow(tx, timeZone));
  }
  return BOM + lines.join(LINE_END) + LINE_END;
}

/**
 * Sort and write the transactions to `destination`, replacing it atomically.
 * Returns the number of data rows written.
 */
export async function exportTransactions(
  transactions: readonly Transaction[],
  destination: string,
  options: ExportOptions,
): Promise<number> {
  const sorted = sortTransactions(transactions);
  const content = renderCsv(sorted, options.timeZone);
  const tmpPath = `${destination}.${process.pid}.tmp`;

  try {
    await mkdir(path.dirname(destination), { recursive: true });
    try {
      await writeFile(tmpPath, content, "utf8");
      await rename(tmpPath, destination);
    } catch (err: unknown) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExportError(`Could not write ${destination}: ${reason}`, destination, { cause: err });
  }

  return sorted.length;
}
