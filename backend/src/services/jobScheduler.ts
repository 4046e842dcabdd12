import cron from "node-cron";
import { DateTime } from "luxon";
import type { TimeOfDay, TimingPolicy } from "../types/channel";
import { startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";
import { formatTimeOfDay } from "../utils/timeOfDay";
import type { FatalStage, Notifier } from "./notificationBridge";

export { parseTimeOfDay } from "../utils/timeOfDay";

export type TriggerResult = "started" | "dropped";
export type TriggerSource = "schedule" | "cron" | "http" | "startup";

export interface CronTask {
  stop(): void;
}

export type CronScheduleFn = (expression: string, callback: () => void, options: { timezone: string }) => CronTask;

const scheduleWithNodeCron: CronScheduleFn = (expression, callback, options) =>
  cron.schedule(expression, callback, { timezone: options.timezone });

/**
 * "03:00" -> "0 3 * * *" (каждый день в HH:MM)
 */
export function toDailyCronExpression(time: TimeOfDay): string {
  return `${time.minute} ${time.hour} * * *`;
}

/**
 * Ближайший момент публикации строго после now в часовом поясе расписания.
 */
export function computeNextTrigger(publishTimes: readonly TimeOfDay[], now: Date, timezone: string): Date {
  if (publishTimes.length === 0) {
    throw new Error("computeNextTrigger: publishTimes must not be empty");
  }

  const today = DateTime.fromJSDate(now, { zone: timezone }).startOf("day");
  // Смещение до двух дней покрывает переходы на летнее/зимнее время
  for (let dayOffset = 0; dayOffset <= 2; dayOffset++) {
    const day = today.plus({ days: dayOffset });
    for (const time of publishTimes) {
      const candidate = day.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
      if (candidate.toMillis() > now.getTime()) {
        return candidate.toJSDate();
      }
    }
  }
  throw new Error(`computeNextTrigger: no trigger found after ${now.toISOString()}`);
}

/**
 * Все моменты публикации в окне (from, to].
 */
export function listTriggersBetween(
  publishTimes: readonly TimeOfDay[],
  from: Date,
  to: Date,
  timezone: string
): Date[] {
  const triggers: Date[] = [];
  let next = computeNextTrigger(publishTimes, from, timezone);
  while (next.getTime() <= to.getTime()) {
    triggers.push(next);
    next = computeNextTrigger(publishTimes, next, timezone);
  }
  return triggers;
}

export interface JobSchedulerOptions {
  timing: TimingPolicy;
  runPublish: () => Promise<unknown>;
  runFetch: () => Promise<unknown>;
  notifier: Notifier;
  schedule?: CronScheduleFn;
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  publishInFlight: boolean;
  fetchInFlight: boolean;
  nextPublishAt: Date;
  timezone: string;
}

type JobKind = "publish" | "fetch";

/**
 * Запускает циклы fetch и публикации по расписанию.
 * Fetch идёт по node-cron, публикация по цепочке таймеров от computeNextTrigger:
 * время, попавшее в переход на летнее время, всё равно срабатывает один раз.
 * Одновременно выполняется не больше одного цикла любого вида.
 */
export class JobScheduler {
  private readonly schedule: CronScheduleFn;
  private readonly now: () => Date;
  private tasks: CronTask[] = [];
  private publishTimer: NodeJS.Timeout | null = null;
  private started = false;
  private active: { kind: JobKind; promise: Promise<void> } | null = null;
  private refilling = false;

  constructor(private readonly options: JobSchedulerOptions) {
    this.schedule = options.schedule ?? scheduleWithNodeCron;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.started) {
      Logger.warn("[Scheduler] Already started");
      return;
    }
    this.started = true;

    const { publishTimes, fetchTime, timezone } = this.options.timing;

    this.tasks.push(
      this.schedule(toDailyCronExpression(fetchTime), () => this.triggerFetch("cron"), { timezone })
    );
    this.schedulePublishAfter(this.now());

    Logger.info("[Scheduler] Started", {
      fetchTime: formatTimeOfDay(fetchTime),
      publishTimes: publishTimes.map(formatTimeOfDay),
      timezone,
      nextPublishAt: this.getNextPublishAt().toISOString()
    });
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    if (this.publishTimer) {
      clearTimeout(this.publishTimer);
      this.publishTimer = null;
    }
    this.started = false;
    Logger.info("[Scheduler] Stopped");
  }

  triggerPublish(source: TriggerSource): TriggerResult {
    return this.trigger("publish", source, this.options.runPublish);
  }

  triggerFetch(source: TriggerSource): TriggerResult {
    return this.trigger("fetch", source, this.options.runFetch);
  }

  /**
   * Дозаполнение очереди внутри уже идущего цикла публикации.
   * Занимает тот же слот, поэтому отдельный fetch в это время отбрасывается.
   */
  async refillWithinCycle<T>(run: () => Promise<T>): Promise<T> {
    this.refilling = true;
    Logger.info("[Scheduler] Refill fetch inside publish cycle");
    try {
      return await run();
    } finally {
      this.refilling = false;
    }
  }

  /**
   * Ждёт завершения текущего цикла (тесты, остановка процесса).
   */
  async whenIdle(): Promise<void> {
    await this.active?.promise;
  }

  getNextPublishAt(): Date {
    return computeNextTrigger(this.options.timing.publishTimes, this.now(), this.options.timing.timezone);
  }

  getStatus(): SchedulerStatus {
    const kind = this.active?.kind ?? null;
    return {
      running: this.started,
      publishInFlight: kind === "publish",
      fetchInFlight: kind === "fetch" || this.refilling,
      nextPublishAt: this.getNextPublishAt(),
      timezone: this.options.timing.timezone
    };
  }

  private schedulePublishAfter(after: Date): void {
    const { publishTimes, timezone } = this.options.timing;
    const next = computeNextTrigger(publishTimes, after, timezone);
    const delay = Math.max(0, next.getTime() - this.now().getTime());

    this.publishTimer = setTimeout(() => {
      this.publishTimer = null;
      this.triggerPublish("schedule");
      // Отсчёт от момента срабатывания, а не от текущего времени: один запуск на каждый момент
      const now = this.now();
      this.schedulePublishAfter(now.getTime() > next.getTime() ? now : next);
    }, delay);
  }

  private trigger(kind: JobKind, source: TriggerSource, run: () => Promise<unknown>): TriggerResult {
    if (this.active) {
      Logger.warn(`[Scheduler] ${kind} trigger dropped, ${this.active.kind} cycle still running`, { source });
      return "dropped";
    }

    const elapsed = startTimer();
    Logger.info(`[Scheduler] ${kind} cycle triggered`, { source });

    const promise = run()
      .then(() => {
        Logger.info(`[Scheduler] ${kind} cycle finished`, { source, elapsed: elapsed() });
        if (kind === "publish") {
          Logger.info("[Scheduler] Next publish", { at: this.getNextPublishAt().toISOString() });
        }
      })
      .catch((error: unknown) => {
        const message = getErrorMessage(error);
        Logger.error(`[Scheduler] ${kind} cycle crashed`, { source, error: message, elapsed: elapsed() });
        const stage: FatalStage = kind;
        this.options.notifier.notify({ type: "FatalPipelineError", stage, message, at: this.now() });
      })
      .finally(() => {
        this.active = null;
      });
    this.active = { kind, promise };

    return "started";
  }
}
