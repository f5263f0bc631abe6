import { Router } from "express";
import { buildNegotiationContext, simulateRequestSchema } from "@counteroffer/shared";
import type { Proposal } from "@counteroffer/shared";
import type { NegotiationAgent } from "../agents/negotiation-agent";
import { asyncRoute } from "../middleware/error-handler";

/** One entry per fallback proposal, so the UI can flag it */
function proposalWarnings(proposals: Proposal[]): string[] {
  return proposals
    .filter((p) => p.degraded)
    .map((p) => `The ${p.strategy} proposal could not be read from the model output; a fallback was used`);
}

export function proposalsRouter(agent: NegotiationAgent): Router {
  const router = Router();

  // POST /api/proposals: draft all three strategies for a vendor message
  router.post(
    "/",
    asyncRoute(async (req, res) => {
      const context = buildNegotiationContext(req.body);
      const result = await agent.generateProposals(context);
      res.json({ ...result, warnings: proposalWarnings(result.proposals) });
    }),
  );

  // POST /api/proposals/simulate: preview the vendor's reply to one proposal
  router.post(
    "/simulate",
    asyncRoute(async (req, res) => {
      const body = simulateRequestSchema.parse(req.body);
      const context = buildNegotiationContext(body.context);
      const simulation = await agent.simulateVendorResponse(context, body.proposal);
      const warnings = simulation.degraded
        ? ["The vendor reply had no recognizable outcome; treated as a counter-offer"]
        : [];
      res.json({ simulation, warnings });
    }),
  );

  // POST /api/proposals/recommend: polite vs firm debate
  router.post(
    "/recommend",
    asyncRoute(async (req, res) => {
      const context = buildNegotiationContext(req.body);
      const recommendation = await agent.recommendStrategy(context);
      const warnings = recommendation.degraded
        ? ["The debate output could not be read; showing the default recommendation"]
        : [];
      res.json({ recommendation, warnings });
    }),
  );

  return router;
}
