import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { Decimal } from "decimal.js";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ExportError } from "../../../src/errors.js";
import {
  CSV_HEADER,
  escapeField,
  exportTransactions,
  renderCsv,
  renderRow,
  sortTransactions,
} from "../../../src/services/exporter.js";
import { fromCashTransaction, fromDividend, fromOrder } from "../../../src/services/factory.js";
import { TEST_CONTEXT, makeCash, makeDividend, makeOrder } from "../../fixtures.js";

const TZ = "Europe/Berlin";

const buy = fromOrder(makeOrder(), TEST_CONTEXT);
const dividend = fromDividend(makeDividend(), TEST_CONTEXT);
const deposit = fromCashTransaction(makeCash(), TEST_CONTEXT);

describe("renderRow", () => {
  it("renders a buy with decimal commas", () => {
    expect(renderRow(buy, TZ)).toBe(
      "01.03.2024;Wertpapierkauf;AAPL_US_EQ;10;50;-501,00;EUR;1,00;Kauf AAPL_US_EQ 10 Stk @ 50",
    );
  });

  it("leaves quantity and price empty for a dividend", () => {
    expect(renderRow(dividend, TZ)).toBe(
      "15.03.2024;Dividende;VUSA_EQ;;;12,35;EUR;0,00;Dividende VUSA_EQ",
    );
  });

  it("leaves the instrument empty for cash movements", () => {
    expect(renderRow(deposit, TZ)).toBe(
      "20.02.2024;Einlage;;;;1000,00;EUR;0,00;Einzahlung auf Verrechnungskonto",
    );
  });

  it("renders the date in the export time zone", () => {
    const late = fromCashTransaction(makeCash({ dateTime: "2024-03-31T22:30:00Z" }), TEST_CONTEXT);

    expect(renderRow(late, "Europe/Berlin").startsWith("01.04.2024;")).toBe(true);
    expect(renderRow(late, "UTC").startsWith("31.03.2024;")).toBe(true);
  });

  it("keeps the full precision of quantity and price", () => {
    const tx = fromOrder(
      makeOrder({ filledQuantity: "0.123456", fillPrice: "181.4275", taxes: [] }),
      TEST_CONTEXT,
    );

    expect(renderRow(tx, TZ).split(";").slice(3, 6)).toEqual(["0,123456", "181,4275", "-22,40"]);
  });
});

describe("escapeField", () => {
  it("leaves plain text alone", () => {
    expect(escapeField("Dividende VUSA_EQ")).toBe("Dividende VUSA_EQ");
  });

  it("quotes text containing the delimiter", () => {
    expect(escapeField("a;b")).toBe('"a;b"');
  });

  it("doubles embedded quotes", () => {
    expect(escapeField('say "hi"')).toBe('"say ""hi"""');
  });

  it("quotes line breaks", () => {
    expect(escapeField("line1\nline2")).toBe('"line1\nline2"');
  });
});

describe("sortTransactions", () => {
  it("orders by ascending timestamp whatever the input order", () => {
    const sorted = sortTransactions([dividend, buy, deposit]);
    expect(sorted).toEqual([deposit, buy, dividend]);
  });

  it("breaks ties by endpoint and then by sequence", () => {
    const at = "2024-05-02T08:00:00Z";
    const cash = fromCashTransaction(makeCash({ dateTime: at }, 0), TEST_CONTEXT);
    const div = fromDividend(makeDividend({ paidOn: at }, 0), TEST_CONTEXT);
    const second = fromOrder(makeOrder({ id: 2, dateExecuted: at }, 1), TEST_CONTEXT);
    const first = fromOrder(makeOrder({ id: 1, dateExecuted: at }, 0), TEST_CONTEXT);

    const sorted = sortTransactions([cash, div, second, first]);

    expect(sorted.map((tx) => tx.reference)).toEqual(["1", "2", "div-1", "cash-1"]);
  });

  it("does not mutate its input", () => {
    const input = [dividend, buy];
    sortTransactions(input);
    expect(input).toEqual([dividend, buy]);
  });
});

describe("renderCsv", () => {
  it("starts with a BOM and the fixed header and uses CRLF", () => {
    const csv = renderCsv([buy], TZ);

    expect(csv).toBe(
      "\uFEFF" +
        "Buchungsdatum;Buchungstext;Wertpapier;Stückzahl;Kurs;Betrag;Währung;Gebühren;Verwendungszweck\r\n" +
        "01.03.2024;Wertpapierkauf;AAPL_US_EQ;10;50;-501,00;EUR;1,00;Kauf AAPL_US_EQ 10 Stk @ 50\r\n",
    );
  });
});

describe("exportTransactions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "t212-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes sorted rows and returns the row count", async () => {
    const destination = path.join(dir, "out.csv");

    const count = await exportTransactions([dividend, buy, deposit], destination, { timeZone: TZ });

    expect(count).toBe(3);
    const content = await readFile(destination, "utf8");
    expect(content).toBe(renderCsv([deposit, buy, dividend], TZ));
    expect(await readdir(dir)).toEqual(["out.csv"]);
  });

  it("creates missing parent directories", async () => {
    const destination = path.join(dir, "nested", "deeper", "out.csv");

    await exportTransactions([buy], destination, { timeZone: TZ });

    expect(await readdir(path.join(dir, "nested", "deeper"))).toEqual(["out.csv"]);
  });

  it("produces byte-identical files for the same input", async () => {
    const first = path.join(dir, "first.csv");
    const second = path.join(dir, "second.csv");

    await exportTransactions([buy, dividend, deposit], first, { timeZone: TZ });
    await exportTransactions([deposit, dividend, buy], second, { timeZone: TZ });

    expect((await readFile(first)).equals(await readFile(second))).toBe(true);
  });

  it("overwrites an existing file", async () => {
    const destination = path.join(dir, "out.csv");
    await writeFile(destination, "old content", "utf8");

    await exportTransactions([buy], destination, { timeZone: TZ });

    expect(await readFile(destination, "utf8")).toBe(renderCsv([buy], TZ));
  });

  it("round-trips numeric values through a semicolon/decimal-comma parser", async () => {
    const sell = fromOrder(
      makeOrder({ id: 7, direction: "SELL", filledQuantity: "2.5", fillPrice: "99.99", taxes: [] }, 1),
      TEST_CONTEXT,
    );
    const transactions = [buy, sell, dividend, deposit];
    const destination = path.join(dir, "out.csv");
    await exportTransactions(transactions, destination, { timeZone: TZ });

    const rows = parse(await readFile(destination, "utf8"), {
      bom: true,
      columns: true,
      delimiter: ";",
    }) as Array<Record<string, string>>;

    const toDecimal = (text: string) => new Decimal(text.replace(",", "."));
    const sorted = sortTransactions(transactions);
    expect(Object.keys(rows[0])).toEqual([...CSV_HEADER]);
    expect(rows).toHaveLength(sorted.length);
    rows.forEach((row, i) => {
      const tx = sorted[i];
      expect(toDecimal(row["Betrag"]).equals(tx.amount)).toBe(true);
      expect(toDecimal(row["Gebühren"]).equals(tx.fees)).toBe(true);
      if (tx.quantity && tx.pricePerUnit) {
        expect(toDecimal(row["Stückzahl"]).equals(tx.quantity)).toBe(true);
        expect(toDecimal(row["Kurs"]).equals(tx.pricePerUnit)).toBe(true);
      } else {
        expect(row["Stückzahl"]).toBe("");
        expect(row["Kurs"]).toBe("");
      }
    });
  });

  it("fails with ExportError when the directory cannot be created", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "", "utf8");

    await expect(
      exportTransactions([buy], path.join(blocker, "out.csv"), { timeZone: TZ }),
    ).rejects.toBeInstanceOf(ExportError);
  });

  it("removes the temporary file when the final rename fails", async () => {
    const destination = path.join(dir, "target");
    await mkdir(destination);

    await expect(exportTransactions([buy], destination, { timeZone: TZ })).rejects.toMatchObject({
      name: "ExportError",
      destination,
    });
    expect(await readdir(dir)).toEqual(["target"]);
  });
});
