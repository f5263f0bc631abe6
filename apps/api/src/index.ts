import { createDb, SqliteNegotiationStore } from "@counteroffer/database";
import { NegotiationAgent } from "./agents/negotiation-agent";
import { createApp } from "./app";
import { loadConfig } from "./config/app-config";
import { createTextGenerator } from "./lib/engines";
import { loadEnvFile } from "./lib/env";

// Env first: nothing reads process.env at import time
const envFile = loadEnvFile();
const config = loadConfig(process.env, envFile);
const generator = createTextGenerator(config.engine);
const { db, client } = createDb(config.databasePath);

const app = createApp({
  agent: new NegotiationAgent(generator),
  store: new SqliteNegotiationStore(db),
  generator,
  corsOrigin: config.corsOrigin,
});

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`api: Configuration from ${config.envFile ?? "process environment only"}`);
});

function shutdown(signal: string): void {
  console.log(`api: ${signal} received, closing`);
  server.close(() => {
    client.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
