import { basicAuthHeader } from "./auth.js";
import { retryDelay } from "./rate-limit.js";
import {
  T212_ENDPOINTS,
  T212_MAX_PAGINATION_PAGES,
  T212_MAX_RETRIES,
  T212_PAGE_SIZE,
  T212_REQUEST_INTERVAL_MS,
  T212_REQUEST_TIMEOUT_MS,
} from "../constants.js";
import { ApiError } from "../errors.js";
import {
  PageSchema,
  type Page,
  type RawCashTransaction,
  type RawDividend,
  type RawOrder,
  type RecordSource,
} from "../models/raw.js";

export interface ApiCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface ClientOptions {
  baseUrl: string;
  pageSize?: number;
  maxPages?: number;
  /** Retries after a 429 before the endpoint is given up. */
  maxRetries?: number;
  /** Pause between successive page requests. */
  requestIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type ResolvedOptions = Required<ClientOptions>;

function resolveOptions(options: ClientOptions): ResolvedOptions {
  return {
    pageSize: T212_PAGE_SIZE,
    maxPages: T212_MAX_PAGINATION_PAGES,
    maxRetries: T212_MAX_RETRIES,
    requestIntervalMs: T212_REQUEST_INTERVAL_MS,
    sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
    now: () => Date.now(),
    ...options,
  };
}

async function request(
  source: RecordSource,
  path: string,
  authorization: string,
  options: ResolvedOptions,
): Promise<Page> {
  for (let attempt = 1; ; attempt++) {
    let res: Response;
    try {
      res = await fetch(`${options.baseUrl}${path}`, {
        method: "GET",
        headers: { Authorization: authorization, Accept: "application/json" },
        signal: AbortSignal.timeout(T212_REQUEST_TIMEOUT_MS),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiError(`API GET ${path} failed: ${reason}`, source, null, { cause: err });
    }

    if (res.status === 429) {
      if (attempt > options.maxRetries) {
        throw new ApiError(
          `API GET ${path} still rate limited after ${options.maxRetries} retries (429)`,
          source,
          429,
        );
      }
      const delayMs = retryDelay(res.headers, attempt, options.now());
      console.warn(
        `[${source}] Rate limited, retry ${attempt}/${options.maxRetries} in ${delayMs}ms...`,
      );
      await options.sleep(delayMs);
      continue;
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ApiError(`API GET ${path} failed (${res.status}): ${text}`, source, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiError(
        `API GET ${path} returned a body that is not JSON: ${reason}`,
        source,
        res.status,
        { cause: err },
      );
    }
    const parsed = PageSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(
        `API GET ${path} returned an unexpected page shape: ${parsed.error.message}`,
        source,
        res.status,
      );
    }
    return parsed.data;
  }
}

async function fetchPaginated(
  source: RecordSource,
  credentials: ApiCredentials,
  clientOptions: ClientOptions,
): Promise<Array<Record<string, unknown>>> {
  const options = resolveOptions(clientOptions);
  const authorization = basicAuthHeader(credentials.apiKey, credentials.apiSecret);
  const all: Array<Record<string, unknown>> = [];
  let path: string | null = `${T212_ENDPOINTS[source]}?limit=${options.pageSize}`;
  let page = 0;

  while (path) {
    if (++page > options.maxPages) {
      console.warn(`[${source}] Pagination limit (${options.maxPages}) reached, stopping.`);
      break;
    }
    if (page > 1 && options.requestIntervalMs > 0) {
      await options.sleep(options.requestIntervalMs);
    }

    const data = await request(source, path, authorization, options);
    console.log(
      `[${source}] page ${page}: ${data.items.length} items, next: ${data.nextPagePath ? "yes" : "no"}`,
    );
    if (data.items.length === 0) {
      break;
    }

    all.push(...data.items);
    path = data.nextPagePath ?? null;
  }

  console.log(`[${source}] Fetched ${all.length} records.`);
  return all;
}

export async function fetchOrders(
  credentials: ApiCredentials,
  options: ClientOptions,
): Promise<RawOrder[]> {
  const items = await fetchPaginated("orders", credentials, options);
  return items.map((data, sequence): RawOrder => ({ kind: "order", sequence, data }));
}

export async function fetchDividends(
  credentials: ApiCredentials,
  options: ClientOptions,
): Promise<RawDividend[]> {
  const items = await fetchPaginated("dividends", credentials, options);
  return items.map((data, sequence): RawDividend => ({ kind: "dividend", sequence, data }));
}

export async function fetchCashTransactions(
  credentials: ApiCredentials,
  options: ClientOptions,
): Promise<RawCashTransaction[]> {
  const items = await fetchPaginated("transactions", credentials, options);
  return items.map((data, sequence): RawCashTransaction => ({ kind: "cashTransaction", sequence, data }));
}

export function createRecordFetcher(options: ClientOptions) {
  return {
    fetchOrders: (credentials: ApiCredentials) => fetchOrders(credentials, options),
    fetchDividends: (credentials: ApiCredentials) => fetchDividends(credentials, options),
    fetchCashTransactions: (credentials: ApiCredentials) => fetchCashTransactions(credentials, options),
  };
}
