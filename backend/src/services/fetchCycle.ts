import type { SchedulerStateStore } from "../repositories/stateStore";
import { formatElapsed, startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage, PipelineError } from "../utils/pipelineErrors";
import { getCooldownRemainingMs, getNextAllowedFetchAt, shouldFetch } from "./cooldownGate";
import type { DiscoveryService } from "./discoveryService";
import type { Notifier } from "./notificationBridge";

export type FetchCycleResult =
  | { status: "skipped"; nextAllowedAt: Date | null }
  | { status: "fetched"; count: number; fetchedAt: Date }
  | { status: "failed"; error: PipelineError };

export interface FetchCycleDeps {
  discovery: DiscoveryService;
  stateStore: SchedulerStateStore;
  notifier: Notifier;
  fetchIntervalHours: number;
}

export interface FetchCycleOptions {
  force: boolean;
  now?: Date;
}

/**
 * Один цикл fetch: проверка cooldown, запуск discovery, запись lastFetchTime.
 * lastFetchTime обновляется только после успешного discovery.
 */
export async function runFetchCycle(deps: FetchCycleDeps, options: FetchCycleOptions): Promise<FetchCycleResult> {
  const now = options.now ?? new Date();
  const elapsed = startTimer();
  const state = await deps.stateStore.read();

  if (!shouldFetch(now, state.lastFetchTime, deps.fetchIntervalHours, options.force)) {
    const nextAllowedAt = getNextAllowedFetchAt(state.lastFetchTime, deps.fetchIntervalHours);
    Logger.info("[FetchCycle] Skipping fetch, cooldown active", {
      lastFetchTime: state.lastFetchTime?.toISOString(),
      nextAllowedIn: formatElapsed(getCooldownRemainingMs(now, state.lastFetchTime, deps.fetchIntervalHours)),
      nextAllowedAt: nextAllowedAt?.toISOString()
    });
    return { status: "skipped", nextAllowedAt };
  }

  Logger.info("[FetchCycle] Fetch started", { force: options.force });

  let errorMessage: string;
  try {
    const result = await deps.discovery.fetchAndQueueItems();
    if (result.ok) {
      await deps.stateStore.recordFetch(now);
      Logger.info("[FetchCycle] Fetch completed", {
        count: result.count,
        fetchedAt: now.toISOString(),
        elapsed: elapsed()
      });
      return { status: "fetched", count: result.count, fetchedAt: now };
    }
    errorMessage = result.error;
  } catch (error) {
    errorMessage = getErrorMessage(error);
  }

  const error = new PipelineError("FetchFailed", errorMessage);
  Logger.error("[FetchCycle] Fetch failed", { error: errorMessage, elapsed: elapsed() });
  deps.notifier.notify({ type: "FatalPipelineError", stage: "fetch", message: error.message, at: new Date() });
  return { status: "failed", error };
}
