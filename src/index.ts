#!/usr/bin/env node
import { createRecordFetcher } from "./api/client.js";
import { config } from "./config.js";
import { keePassCredentialProvider } from "./services/credentials.js";
import { exportTransactions } from "./services/exporter.js";
import { describeProblems, runSync } from "./services/sync.js";

async function main(): Promise<void> {
  console.log(`Syncing Trading 212 (${config.environment}) -> ${config.outputFile}`);

  const report = await runSync(
    {
      credentials: keePassCredentialProvider(config.keepass),
      api: createRecordFetcher({ baseUrl: config.baseUrl }),
      exportTransactions: (transactions, destination) =>
        exportTransactions(transactions, destination, { timeZone: config.timeZone }),
    },
    { destination: config.outputFile, accountCurrency: config.accountCurrency },
  );

  for (const line of describeProblems(report)) {
    console.error(line);
  }

  if (report.state === "Failed") {
    process.exitCode = 1;
    return;
  }

  console.log(`Wrote ${report.rowsWritten} transactions to ${config.outputFile}.`);
  if (report.skippedOrders > 0) {
    console.log(`Skipped ${report.skippedOrders} unfilled order(s).`);
  }
  console.log("The file can now be imported into Finanzblick.");
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
