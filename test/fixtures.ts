import type { ApiCredentials } from "../src/api/client.js";
import type { RawCashTransaction, RawDividend, RawOrder } from "../src/models/raw.js";
import type { FactoryContext } from "../src/services/factory.js";

export const TEST_CREDENTIALS: ApiCredentials = {
  apiKey: "test-key",
  apiSecret: "test-secret",
};

export const TEST_CONTEXT: FactoryContext = { accountCurrency: "EUR" };

export function makeOrder(overrides: Record<string, unknown> = {}, sequence = 0): RawOrder {
  return {
    kind: "order",
    sequence,
    data: {
      id: 1001,
      type: "MARKET",
      status: "FILLED",
      ticker: "AAPL_US_EQ",
      direction: "BUY",
      filledQuantity: 10,
      fillPrice: 50,
      dateCreated: "2024-03-01T09:00:00.000Z",
      dateExecuted: "2024-03-01T09:00:05.000Z",
      taxes: [{ name: "CURRENCY_CONVERSION_FEE", quantity: -1 }],
      ...overrides,
    },
  };
}

export function makeDividend(overrides: Record<string, unknown> = {}, sequence = 0): RawDividend {
  return {
    kind: "dividend",
    sequence,
    data: {
      reference: "div-1",
      ticker: "VUSA_EQ",
      quantity: 20,
      amount: 12.345,
      paidOn: "2024-03-15T00:00:00.000Z",
      type: "ORDINARY",
      ...overrides,
    },
  };
}

export function makeCash(overrides: Record<string, unknown> = {}, sequence = 0): RawCashTransaction {
  return {
    kind: "cashTransaction",
    sequence,
    data: {
      reference: "cash-1",
      type: "DEPOSIT",
      amount: 1000,
      dateTime: "2024-02-20T12:00:00.000Z",
      ...overrides,
    },
  };
}
