import type { QueueSource } from "../repositories/queueRepository";
import type { SchedulerStateStore } from "../repositories/stateStore";
import type { QueueOrdering } from "../types/channel";
import type { CycleReport, QueueItem } from "../types/pipeline";
import { startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import type { PipelineError } from "../utils/pipelineErrors";
import type { Channel } from "./channels";
import type { FanoutCoordinator } from "./fanoutCoordinator";
import type { FetchCycleResult } from "./fetchCycle";
import { selectNext, SelectionResult } from "./itemSelector";
import type { Notifier } from "./notificationBridge";

export type PublishCycleResult =
  | { status: "no-item" }
  | { status: "no-channels" }
  | { status: "failed"; itemId: string; error: PipelineError }
  | { status: "completed"; itemId: string; report: CycleReport; consumed: boolean };

export interface PublishCycleDeps {
  queue: QueueSource;
  stateStore: SchedulerStateStore;
  channels: readonly Channel[];
  coordinator: Pick<FanoutCoordinator, "run">;
  notifier: Notifier;
  ordering: QueueOrdering;
  /** Принудительный fetch, когда очередь пуста */
  refill?: () => Promise<FetchCycleResult>;
}

export interface PublishCycleOptions {
  refillWhenEmpty: boolean;
}

async function selectFromQueue(deps: PublishCycleDeps): Promise<SelectionResult> {
  const [state, queue] = await Promise.all([deps.stateStore.read(), deps.queue.listItems()]);
  return selectNext(queue, state.consumedItemIds, deps.ordering);
}

async function consume(deps: PublishCycleDeps, item: QueueItem, report: CycleReport): Promise<boolean> {
  if (!report.some((outcome) => outcome.success)) {
    Logger.warn("[PublishCycle] No channel succeeded, item stays queued", { itemId: item.id });
    return false;
  }
  await deps.stateStore.markConsumed(item.id);
  Logger.info("[PublishCycle] Item marked consumed", { itemId: item.id });
  return true;
}

/**
 * Один цикл публикации: выбор элемента, раздача по каналам, отметка consumed.
 */
export async function runPublishCycle(
  deps: PublishCycleDeps,
  options: PublishCycleOptions
): Promise<PublishCycleResult> {
  const elapsed = startTimer();

  if (deps.channels.length === 0) {
    Logger.warn("[PublishCycle] No enabled channels, skipping cycle");
    return { status: "no-channels" };
  }

  let selection = await selectFromQueue(deps);
  if (!selection.ok && options.refillWhenEmpty && deps.refill) {
    Logger.info("[PublishCycle] Queue empty, fetching fresh items first");
    const refill = await deps.refill();
    Logger.info("[PublishCycle] Queue refill finished", { status: refill.status });
    selection = await selectFromQueue(deps);
  }

  if (!selection.ok) {
    Logger.warn("[PublishCycle] No queued items available", { reason: selection.reason });
    return { status: "no-item" };
  }

  const item = selection.item;
  Logger.info("[PublishCycle] Selected item", { itemId: item.id, title: item.title, score: item.score });

  const fanout = await deps.coordinator.run(item, deps.channels);
  if (!fanout.ok) {
    Logger.error("[PublishCycle] Cycle aborted", { itemId: item.id, error: fanout.error.message });
    deps.notifier.notify({
      type: "FatalPipelineError",
      stage: "publish",
      itemId: item.id,
      message: fanout.error.message,
      at: new Date()
    });
    return { status: "failed", itemId: item.id, error: fanout.error };
  }

  const consumed = await consume(deps, item, fanout.report);
  Logger.info("[PublishCycle] Completed", { itemId: item.id, consumed, elapsed: elapsed() });
  return { status: "completed", itemId: item.id, report: fanout.report, consumed };
}
