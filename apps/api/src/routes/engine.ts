import { Router } from "express";
import type { TextGenerator } from "../lib/engines/types";
import { asyncRoute } from "../middleware/error-handler";

export function engineRouter(generator: TextGenerator): Router {
  const router = Router();

  // GET /api/engine
  router.get("/", (_req, res) => {
    res.json(generator.describe());
  });

  // GET /api/engine/self-test: pre-flight check; 200 either way, see `success`
  router.get(
    "/self-test",
    asyncRoute(async (_req, res) => {
      const result = await generator.selfTest();
      console.log(`engine: Self-test ${result.success ? "passed" : "failed"}: ${result.message}`);
      res.json(result);
    }),
  );

  return router;
}
