import { Router } from "express";
import type { NegotiationRecordStore } from "@counteroffer/database";
import {
  buildNegotiationContext,
  buildNegotiationRecord,
  saveNegotiationRequestSchema,
} from "@counteroffer/shared";
import { asyncRoute } from "../middleware/error-handler";

export function negotiationsRouter(store: NegotiationRecordStore): Router {
  const router = Router();

  // POST /api/negotiations: record a finished negotiation
  router.post(
    "/",
    asyncRoute(async (req, res) => {
      const body = saveNegotiationRequestSchema.parse(req.body);
      const record = buildNegotiationRecord({
        context: buildNegotiationContext(body.context),
        proposal: body.proposal,
        simulation: body.simulation,
        finalPrice: body.finalPrice,
        success: body.success,
      });

      const id = await store.saveNegotiation(record);
      res.status(201).json({ id });
    }),
  );

  // GET /api/negotiations?serviceType=
  router.get(
    "/",
    asyncRoute(async (req, res) => {
      const { serviceType } = req.query;
      const negotiations = await store.listNegotiations(
        typeof serviceType === "string" && serviceType.length > 0 ? { serviceType } : {},
      );
      res.json({ negotiations });
    }),
  );

  return router;
}
