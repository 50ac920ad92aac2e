import { Router } from "express";
import { z } from "zod";
import { Logger } from "../lib/logger";
import { HarvestService, RunRejectedError } from "../pipeline/harvester";

const harvestBodySchema = z.object({
  sources: z.array(z.string().min(1)).optional()
});

const recordsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
  offset: z.coerce.number().int().nonnegative().default(0),
  source: z.string().min(1).optional()
});

export function createHarvestRouter(harvest: HarvestService, logger: Logger): Router {
  const router = Router();

  router.get("/health", async (_request, response) => {
    const health = await harvest.health();
    logger.debug("health_requested", health);
    response.status(health.ok ? 200 : 503).json({ ...health, timestamp: new Date().toISOString() });
  });

  router.post("/harvest", (request, response) => {
    const parsed = harvestBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn("harvest_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      logger.info("harvest_requested", { sources: parsed.data.sources ?? "enabled" });
      const started = harvest.startHarvest(parsed.data.sources);
      response.status(202).json({
        run_id: started.run.run_id,
        status: started.run.state,
        sources: started.sources.map((status) => ({ id: status.id, kind: status.kind, state: status.state }))
      });
    } catch (error) {
      if (!(error instanceof RunRejectedError)) {
        throw error;
      }
      logger.warn("harvest_request_rejected", { reason: error.reason, message: error.message });
      response.status(error.reason === "run_active" ? 409 : 400).json({ error: error.message, reason: error.reason });
    }
  });

  router.get("/status", (_request, response) => {
    const status = harvest.getStatus();
    logger.debug("status_requested", { run_id: status.run?.run_id, state: status.run?.state });
    response.json(status);
  });

  router.get("/records", (request, response) => {
    const parsed = recordsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("records_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { limit, offset, source } = parsed.data;
    const page = harvest.getRecords(limit, offset, source);
    response.json({ total: page.total, limit, offset, ...(source ? { source } : {}), records: page.records });
  });

  router.get("/stats", (_request, response) => {
    const stats = harvest.getStats();
    if (!stats) {
      response.status(404).json({ error: "no completed run" });
      return;
    }
    response.json(stats);
  });

  return router;
}
