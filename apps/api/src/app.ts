import cors from "cors";
import express, { type Express } from "express";
import type { NegotiationRecordStore } from "@counteroffer/database";
import type { NegotiationAgent } from "./agents/negotiation-agent";
import type { TextGenerator } from "./lib/engines/types";
import { errorHandler } from "./middleware/error-handler";
import { engineRouter } from "./routes/engine";
import { negotiationsRouter } from "./routes/negotiations";
import { proposalsRouter } from "./routes/proposals";
import { savingsRouter } from "./routes/savings";

export interface AppDependencies {
  agent: NegotiationAgent;
  store: NegotiationRecordStore;
  generator: TextGenerator;
  corsOrigin?: string;
}

export function createApp({ agent, store, generator, corsOrigin }: AppDependencies): Express {
  const app = express();

  app.use(cors(corsOrigin ? { origin: corsOrigin } : undefined));
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/engine", engineRouter(generator));
  app.use("/api/proposals", proposalsRouter(agent));
  app.use("/api/negotiations", negotiationsRouter(store));
  app.use("/api/savings", savingsRouter(store));

  app.use(errorHandler);
  return app;
}
