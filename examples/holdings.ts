import "dotenv/config";
import { SmartApiClient, loadConfig } from "../src";

const client = new SmartApiClient(loadConfig());

(async () => {
  const { data } = await client.portfolio.holdings();
  const holdings = data ?? [];

  for (const holding of holdings) {
    console.log(`${holding.tradingsymbol}: ${holding.quantity} @ ${holding.averageprice} (P&L ${holding.profitandloss})`);
  }
  console.log(`${holdings.length} holdings`);
})().catch(console.error);
