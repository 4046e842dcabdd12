import { NextFunction, Request, Response, Router } from "express";
import type { JobScheduler, TriggerResult } from "../services/jobScheduler";
import { Logger } from "../utils/logger";

/**
 * Проверка заголовка x-cron-secret (внешний планировщик, например Cloud Scheduler)
 */
export function requireCronSecret(cronSecret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!cronSecret) {
      Logger.warn("[CronRoutes] CRON_SECRET is not configured, tick endpoints are disabled");
      return res.status(500).json({ error: "CRON_SECRET is not configured" });
    }

    const token = req.headers["x-cron-secret"];
    if (token !== cronSecret) {
      Logger.warn("[CronRoutes] Unauthorized tick attempt", { path: req.path });
      return res.status(403).json({ error: "Forbidden" });
    }
    return next();
  };
}

function sendTriggerResult(res: Response, result: TriggerResult) {
  return res.status(result === "started" ? 202 : 409).json({ result });
}

export function createCronRoutes(
  scheduler: Pick<JobScheduler, "triggerPublish" | "triggerFetch">,
  cronSecret: string | undefined
): Router {
  const router = Router();
  router.use(requireCronSecret(cronSecret));

  router.post("/publish-tick", (_req, res) => {
    Logger.info("[CronRoutes] Publish tick triggered via HTTP endpoint");
    return sendTriggerResult(res, scheduler.triggerPublish("http"));
  });

  router.post("/fetch-tick", (_req, res) => {
    Logger.info("[CronRoutes] Fetch tick triggered via HTTP endpoint");
    return sendTriggerResult(res, scheduler.triggerFetch("http"));
  });

  return router;
}
