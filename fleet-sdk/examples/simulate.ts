import { FleetTelemetryClient, loadSimulatorEnv, runSimulator } from "../src/index.js";

const env = loadSimulatorEnv();

const client = new FleetTelemetryClient({ baseURL: env.API_BASE });
const ac = new AbortController();
process.on("SIGINT", () => ac.abort());
process.on("SIGTERM", () => ac.abort());

console.log(
  `[client] starting. api=${client.baseURL()} asset_id=${env.ASSET_ID} interval=${env.INTERVAL_SECONDS}s window=${env.WINDOW}`
);
runSimulator({
  client,
  assetId: env.ASSET_ID,
  intervalMs: env.INTERVAL_SECONDS * 1000,
  window: env.WINDOW,
  signal: ac.signal,
})
  .then((ticks) => console.log(`[client] stopped after ${ticks} ticks`))
  .catch((e) => { console.error(e); process.exit(1); });
