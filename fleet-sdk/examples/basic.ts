import { FleetTelemetryClient } from "../src/index.js";

async function main() {
  const client = new FleetTelemetryClient({ baseURL: "http://localhost:8000" });

  const stored = await client.postReading({
    asset_id: "pump-7",
    temperature_c: 88.5,
    vibration_rms: 2.1,
    pressure_psi: 47,
  });
  const latest = await client.getLatest("pump-7", 10);
  console.log(stored.id, latest.window_used, latest.risk);
}

main().catch(console.error);
