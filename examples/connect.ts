import "dotenv/config";
import { SmartApiClient, loadConfig } from "../src";

const client = new SmartApiClient({
  ...loadConfig(),
  callbacks: {
    onLogin: (session) => console.log(`Logged in at ${session.establishedAt.toISOString()}`),
    onError: (err) => console.error(`Error [${err.code}]: ${err.message}`),
  },
});

(async () => {
  await client.session.ensure();
  console.log("Authenticated:", client.session.isAuthenticated);
})().catch(console.error);
