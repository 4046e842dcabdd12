import * as http from "http";
import express from "express";
import cors from "cors";
import type { SchedulerStateStore } from "./repositories/stateStore";
import type { JobScheduler } from "./services/jobScheduler";
import { createCronRoutes } from "./routes/cronRoutes";
import { createMediaRoutes } from "./routes/mediaRoutes";
import { createSchedulerRoutes } from "./routes/schedulerRoutes";
import { Logger } from "./utils/logger";

export interface ServerDeps {
  scheduler: Pick<JobScheduler, "getStatus" | "triggerPublish" | "triggerFetch">;
  stateStore: SchedulerStateStore;
  outputRoot: string;
  cronSecret?: string;
  allowedOrigins: readonly string[];
  /** false: без /api/cron (одноразовый запуск) */
  enableCronRoutes?: boolean;
}

export function createServerApp(deps: ServerDeps): express.Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // Разрешаем запросы без origin (curl, Cloud Scheduler)
        if (!origin) {
          return callback(null, true);
        }
        const normalizedOrigin = origin.replace(/\/+$/, "");
        if (deps.allowedOrigins.includes(normalizedOrigin)) {
          return callback(null, true);
        }
        callback(new Error("Not allowed by CORS"));
      }
    })
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/scheduler", createSchedulerRoutes(deps.scheduler, deps.stateStore));
  const routes = ["/health", "/api/scheduler"];
  if (deps.enableCronRoutes ?? true) {
    app.use("/api/cron", createCronRoutes(deps.scheduler, deps.cronSecret));
    routes.push("/api/cron");
  }
  app.use("/api/media", createMediaRoutes(deps.outputRoot));
  routes.push("/api/media");

  Logger.info("[Server] Routes registered", { routes });

  return app;
}

export function startHttpServer(app: express.Express, port: number, host = "0.0.0.0"): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      Logger.info(`[Server] Listening on port ${port} (${host})`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
