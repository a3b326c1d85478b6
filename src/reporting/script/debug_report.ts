// Load envs from .env
// npx tsx src/reporting/script/debug_report.ts [snapshot.json] [TICKER ...]
import "dotenv/config";
import path from "path";
import { runReportBatch } from "../business/run_report_batch";
import {
  createSnapshotProviders,
  readSnapshotFile,
} from "../infrastructure/snapshot_provider";

async function main() {
  const [fileArg, ...tickerArgs] = process.argv.slice(2);
  const filePath = fileArg ?? path.join(__dirname, "fixtures", "snapshot.json");
  const snapshot = readSnapshotFile(filePath);
  const tickers = tickerArgs.length > 0 ? tickerArgs : Object.keys(snapshot);

  const result = await runReportBatch(
    { tickers },
    createSnapshotProviders(snapshot)
  );
  // Print structured result for inspection
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
