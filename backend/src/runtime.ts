/**
 * Сборка зависимостей процесса и запуск выбранного режима.
 */

import type * as http from "http";
import type { EnvSettings } from "./config/env";
import { FirestoreDocumentStore } from "./repositories/documentStore";
import { FirestoreStateStore } from "./repositories/firestoreStateStore";
import { FileQueueSource, FirestoreQueueSource, QueueSource } from "./repositories/queueRepository";
import { FileStateStore, SchedulerStateStore } from "./repositories/stateStore";
import { createServerApp, startHttpServer } from "./server";
import { BlotatoPublisherService } from "./services/blotatoPublisherService";
import { buildChannels, Channel, ChannelPublishers } from "./services/channels";
import { CommandDiscoveryService, DiscoveryService } from "./services/discoveryService";
import { FanoutCoordinator } from "./services/fanoutCoordinator";
import { FetchCycleResult, runFetchCycle } from "./services/fetchCycle";
import { getFirebaseError, getFirestore } from "./services/firebaseAdmin";
import { CronScheduleFn, JobScheduler } from "./services/jobScheduler";
import { CommandMediaGenerator, MediaGenerator } from "./services/mediaGenerationService";
import { NotificationBridge, NotificationTransport } from "./services/notificationBridge";
import { PublishCycleResult, runPublishCycle } from "./services/publishCycle";
import { TelegramNotificationTransport } from "./services/telegramNotificationTransport";
import { checkYoutubeTokenExpiry } from "./services/tokenExpiryCheck";
import { YoutubePublisherService } from "./services/youtubePublisherService";
import type { ScheduleConfig } from "./types/channel";
import type { CliOptions } from "./utils/cliArgs";
import { startTimer } from "./utils/formatElapsed";
import { Logger } from "./utils/logger";

export interface RuntimeOverrides {
  stateStore?: SchedulerStateStore;
  queue?: QueueSource;
  discovery?: DiscoveryService;
  generator?: MediaGenerator;
  publishers?: ChannelPublishers;
  transport?: NotificationTransport | null;
  schedule?: CronScheduleFn;
}

export interface Runtime {
  config: ScheduleConfig;
  env: EnvSettings;
  stateStore: SchedulerStateStore;
  notifier: NotificationBridge;
  channels: readonly Channel[];
  scheduler: JobScheduler;
  runFetch(force: boolean): Promise<FetchCycleResult>;
  runPublish(refillWhenEmpty: boolean): Promise<PublishCycleResult>;
}

function createStorage(env: EnvSettings): { stateStore: SchedulerStateStore; queue: QueueSource } {
  if (env.storageDriver === "firestore") {
    const db = getFirestore();
    if (!db) {
      throw new Error(`FIRESTORE_UNAVAILABLE: ${getFirebaseError()?.message ?? "Firestore is not initialized"}`);
    }
    Logger.info("[Runtime] Using Firestore storage");
    const documents = new FirestoreDocumentStore(db);
    return { stateStore: new FirestoreStateStore(documents), queue: new FirestoreQueueSource(documents) };
  }

  Logger.info("[Runtime] Using file storage", { stateFile: env.stateFile, queueFile: env.queueFile });
  return { stateStore: new FileStateStore(env.stateFile), queue: new FileQueueSource(env.queueFile) };
}

export function createNotificationTransport(env: EnvSettings): NotificationTransport | null {
  if (!env.telegram) {
    Logger.warn("[Runtime] Telegram is not configured, notifications will only be logged");
    return null;
  }
  return new TelegramNotificationTransport(env.telegram);
}

export function createRuntime(
  config: ScheduleConfig,
  env: EnvSettings,
  overrides: RuntimeOverrides = {}
): Runtime {
  const storage =
    overrides.stateStore && overrides.queue
      ? { stateStore: overrides.stateStore, queue: overrides.queue }
      : createStorage(env);
  const stateStore = overrides.stateStore ?? storage.stateStore;
  const queue = overrides.queue ?? storage.queue;

  const transport = overrides.transport !== undefined ? overrides.transport : createNotificationTransport(env);
  const notifier = new NotificationBridge(transport, env.notifyChatIds, env.notifySubjectPrefix);

  const discovery =
    overrides.discovery ?? new CommandDiscoveryService({ command: config.discovery.command, queueFile: env.queueFile });
  const generator =
    overrides.generator ??
    new CommandMediaGenerator({
      generation: config.generation,
      shared: config.shared,
      timezone: config.timing.timezone,
      publicBaseUrl: env.publicBaseUrl
    });
  const publishers = overrides.publishers ?? {
    primary: new YoutubePublisherService(),
    secondary: new BlotatoPublisherService(env.blotatoApiKey)
  };

  const channels = buildChannels(config.channels, publishers);
  const coordinator = new FanoutCoordinator({ generator, notifier });

  const runFetch = (force: boolean) =>
    runFetchCycle(
      { discovery, stateStore, notifier, fetchIntervalHours: config.timing.fetchIntervalHours },
      { force }
    );

  const runPublish = (refillWhenEmpty: boolean) =>
    runPublishCycle(
      {
        queue,
        stateStore,
        channels,
        coordinator,
        notifier,
        ordering: config.queueOrdering,
        refill: () => scheduler.refillWithinCycle(() => runFetch(true))
      },
      { refillWhenEmpty }
    );

  const scheduler: JobScheduler = new JobScheduler({
    timing: config.timing,
    runPublish: () => runPublish(config.refillQueueWhenEmpty),
    runFetch: () => runFetch(false),
    notifier,
    schedule: overrides.schedule
  });

  Logger.info("[Runtime] Channels loaded", {
    enabled: channels.map((channel) => `${channel.id} (${channel.kind})`),
    disabled: config.channels.filter((channel) => !channel.enabled).map((channel) => channel.id)
  });

  return { config, env, stateStore, notifier, channels, scheduler, runFetch, runPublish };
}

async function maybeStartServer(
  runtime: Runtime,
  required: boolean,
  enableCronRoutes: boolean
): Promise<http.Server | null> {
  if (!required || !runtime.env.httpServerEnabled) {
    return null;
  }
  const app = createServerApp({
    scheduler: runtime.scheduler,
    enableCronRoutes,
    stateStore: runtime.stateStore,
    outputRoot: runtime.config.shared.outputRoot,
    cronSecret: runtime.env.cronSecret,
    allowedOrigins: runtime.env.allowedOrigins
  });
  return startHttpServer(app, runtime.env.port);
}

function closeServer(server: http.Server | null): Promise<void> {
  if (!server) {
    return Promise.resolve();
  }
  return new Promise((resolve) => server.close(() => resolve()));
}

/**
 * fetch-only и run-once: возвращает код выхода процесса.
 */
export async function runOneShot(runtime: Runtime, cli: CliOptions): Promise<number> {
  const elapsed = startTimer();

  if (cli.mode === "fetch-only") {
    try {
      const result = await runtime.runFetch(cli.forceFetch);
      Logger.info("[Runtime] Fetch-only finished", { status: result.status, elapsed: elapsed() });
      return result.status === "failed" ? 1 : 0;
    } finally {
      await runtime.notifier.flush();
    }
  }

  await checkYoutubeTokenExpiry(runtime.config.channels, runtime.notifier);

  // Blotato скачивает видео по публичному URL, поэтому в run-once тоже нужен /api/media.
  // Cron-маршрутов здесь нет: циклы этого процесса идут мимо планировщика.
  const server = await maybeStartServer(runtime, Boolean(runtime.env.publicBaseUrl), false);
  try {
    const fetchResult = await runtime.runFetch(cli.forceFetch);
    if (fetchResult.status === "failed") {
      return 1;
    }
    const publishResult = await runtime.runPublish(false);
    Logger.info("[Runtime] Run-once finished", { status: publishResult.status, elapsed: elapsed() });
    return publishResult.status === "failed" ? 1 : 0;
  } finally {
    await closeServer(server);
    await runtime.notifier.flush();
  }
}

/**
 * continuous: планировщик и HTTP-сервер до сигнала остановки.
 */
export async function runContinuous(runtime: Runtime, cli: CliOptions): Promise<() => Promise<void>> {
  await checkYoutubeTokenExpiry(runtime.config.channels, runtime.notifier);

  if (cli.forceFetch) {
    await runtime.runFetch(true);
  }

  runtime.scheduler.start();
  const server = await maybeStartServer(runtime, true, true);

  return async () => {
    Logger.info("[Runtime] Shutting down");
    runtime.scheduler.stop();
    await closeServer(server);
    await runtime.scheduler.whenIdle();
    await runtime.notifier.flush();
  };
}
