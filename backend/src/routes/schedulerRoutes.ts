import { Router } from "express";
import type { SchedulerStateStore } from "../repositories/stateStore";
import type { JobScheduler } from "../services/jobScheduler";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

export function createSchedulerRoutes(
  scheduler: Pick<JobScheduler, "getStatus">,
  stateStore: SchedulerStateStore
): Router {
  const router = Router();

  router.get("/status", async (_req, res) => {
    try {
      const state = await stateStore.read();
      const status = scheduler.getStatus();
      return res.json({
        lastFetchTime: state.lastFetchTime ? state.lastFetchTime.toISOString() : null,
        consumedCount: state.consumedItemIds.size,
        nextPublishAt: status.nextPublishAt.toISOString(),
        timezone: status.timezone,
        running: status.running,
        publishInFlight: status.publishInFlight,
        fetchInFlight: status.fetchInFlight
      });
    } catch (error) {
      Logger.error("[SchedulerRoutes] Failed to read status", { error: getErrorMessage(error) });
      return res.status(500).json({ error: "Failed to read scheduler state" });
    }
  });

  return router;
}
