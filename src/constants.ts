export const T212_BASE_URLS = {
  live: "https://live.trading212.com",
  demo: "https://demo.trading212.com",
} as const;

export const T212_ENDPOINTS = {
  orders: "/api/v0/equity/history/orders",
  dividends: "/api/v0/history/dividends",
  transactions: "/api/v0/history/transactions",
} as const;

export const T212_PAGE_SIZE = 50;
export const T212_REQUEST_TIMEOUT_MS = 30_000;
export const T212_REQUEST_INTERVAL_MS = 200;
export const T212_MAX_PAGINATION_PAGES = 1_000;
export const T212_MAX_RETRIES = 5;
export const T212_BACKOFF_BASE_MS = 1_000;
export const T212_BACKOFF_MAX_MS = 30_000;

export const DEFAULT_OUTPUT_FILE = "finanzblick_import_trading212.csv";
export const DEFAULT_ACCOUNT_CURRENCY = "EUR";
export const DEFAULT_EXPORT_TIMEZONE = "Europe/Berlin";
export const DEFAULT_KEY_FIELD = "UserName";
export const DEFAULT_SECRET_FIELD = "Password";

export const AMOUNT_DECIMALS = 2;
