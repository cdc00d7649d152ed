import "dotenv/config";
import { SmartApiClient, INTERVAL, loadConfig } from "../src";

const client = new SmartApiClient(loadConfig());

const symbolToken = process.argv[2] ?? "3045";

(async () => {
  const { data: candles } = await client.candles.get({
    startTime: "2024-01-01 09:15",
    endTime: "2024-01-31 15:30",
    symbolToken,
    interval: INTERVAL.ONE_DAY,
  });

  console.log("Last 5 candles:", candles.slice(-5));
  console.log(`Fetched ${candles.length} candles for token ${symbolToken}`);
})().catch(console.error);
