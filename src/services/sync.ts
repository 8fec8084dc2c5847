import type { CredentialProvider } from "./credentials.js";
import { normalizeRecords, type RecordFailure } from "./factory.js";
import type { ApiCredentials } from "../api/client.js";
import { ApiError, SyncError } from "../errors.js";
import {
  SOURCE_ORDER,
  type RawCashTransaction,
  type RawDividend,
  type RawOrder,
  type RawRecord,
  type RecordSource,
} from "../models/raw.js";
import type { Transaction } from "../models/transaction.js";

export type SyncState =
  | "Init"
  | "CredentialsResolved"
  | "Fetched"
  | "Normalized"
  | "Exported"
  | "Done"
  | "Failed";

export interface RecordFetcher {
  fetchOrders(credentials: ApiCredentials): Promise<RawOrder[]>;
  fetchDividends(credentials: ApiCredentials): Promise<RawDividend[]>;
  fetchCashTransactions(credentials: ApiCredentials): Promise<RawCashTransaction[]>;
}

export interface SyncDependencies {
  credentials: CredentialProvider;
  api: RecordFetcher;
  exportTransactions(transactions: readonly Transaction[], destination: string): Promise<number>;
}

export interface SyncOptions {
  destination: string;
  accountCurrency: string;
}

export interface EndpointFailure {
  source: RecordSource;
  error: Error;
}

export interface SyncReport {
  state: "Done" | "Failed";
  rowsWritten: number;
  skippedOrders: number;
  recordFailures: RecordFailure[];
  endpointFailures: EndpointFailure[];
  error: Error | null;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export async function runSync(deps: SyncDependencies, options: SyncOptions): Promise<SyncReport> {
  let state: SyncState = "Init";
  const enter = (next: SyncState) => {
    state = next;
    console.log(`[sync] ${next}`);
  };

  const report: SyncReport = {
    state: "Failed",
    rowsWritten: 0,
    skippedOrders: 0,
    recordFailures: [],
    endpointFailures: [],
    error: null,
  };

  try {
    const credentials = await deps.credentials.resolve();
    enter("CredentialsResolved");

    const results = await Promise.allSettled([
      deps.api.fetchOrders(credentials),
      deps.api.fetchDividends(credentials),
      deps.api.fetchCashTransactions(credentials),
    ]);

    const records: RawRecord[] = [];
    results.forEach((result, i) => {
      const source = SOURCE_ORDER[i];
      if (result.status === "fulfilled") {
        records.push(...result.value);
        return;
      }
      const error = toError(result.reason);
      console.warn(`[sync] Fetching ${source} failed: ${error.message}`);
      report.endpointFailures.push({ source, error });
    });

    if (report.endpointFailures.length === results.length) {
      const last = report.endpointFailures[report.endpointFailures.length - 1].error;
      throw new ApiError(
        `All endpoints failed to fetch: ${report.endpointFailures.map((f) => f.source).join(", ")}`,
        "all",
        last instanceof ApiError ? last.status : null,
        { cause: last },
      );
    }
    enter("Fetched");

    const normalized = normalizeRecords(records, { accountCurrency: options.accountCurrency });
    report.recordFailures = normalized.failures;
    report.skippedOrders = normalized.skipped;
    enter("Normalized");

    if (normalized.transactions.length === 0) {
      throw new SyncError("No transactions to export");
    }

    report.rowsWritten = await deps.exportTransactions(normalized.transactions, options.destination);
    enter("Exported");

    enter("Done");
    report.state = "Done";
    return report;
  } catch (err: unknown) {
    report.error = toError(err);
    const reached = state;
    enter("Failed");
    console.error(`[sync] Failed after ${reached}: ${report.error.message}`);
    return report;
  }
}

/** Human-readable lines describing what went wrong, one per problem. */
export function describeProblems(report: SyncReport): string[] {
  const lines: string[] = [];
  for (const failure of report.endpointFailures) {
    lines.push(`Endpoint ${failure.source} unavailable: ${failure.error.message}`);
  }
  if (report.recordFailures.length > 0) {
    lines.push(`${report.recordFailures.length} record(s) could not be converted:`);
    for (const failure of report.recordFailures) {
      lines.push(`  [${failure.source}] ${failure.reference}: ${failure.error.message}`);
    }
  }
  if (report.error) {
    lines.push(`Sync failed: ${report.error.message}`);
  }
  return lines;
}
