import { Router } from "express";
import type { NegotiationRecordStore } from "@counteroffer/database";
import { asyncRoute } from "../middleware/error-handler";

export function savingsRouter(store: NegotiationRecordStore): Router {
  const router = Router();

  // GET /api/savings: annualized totals with strategy and service breakdowns
  router.get(
    "/",
    asyncRoute(async (_req, res) => {
      res.json(await store.getTotalSavings());
    }),
  );

  // GET /api/savings/funnel: saved → simulated → degraded event counts
  router.get(
    "/funnel",
    asyncRoute(async (_req, res) => {
      res.json(await store.getFunnelAnalysis());
    }),
  );

  return router;
}
