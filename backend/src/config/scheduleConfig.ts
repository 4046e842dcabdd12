/**
 * Загрузка и валидация конфигурации расписания (channel_schedule.json).
 *
 * Единственное преобразование обратной совместимости - нормализация времени публикации:
 * скалярное значение dailyPublishTimes или устаревшее поле dailyPublishTime превращаются
 * в список publishTimes. Дальше по коду используется только TimingPolicy.publishTimes.
 */

import * as fs from "fs/promises";
import { IANAZone } from "luxon";
import { z } from "zod";
import type {
  ChannelConfig,
  PrimaryChannelConfig,
  ScheduleConfig,
  SecondaryChannelConfig,
  TimeOfDay,
  TimingPolicy
} from "../types/channel";
import { ConfigInvalidError, getErrorMessage } from "../utils/pipelineErrors";
import { compareTimeOfDay, formatTimeOfDay, parseTimeOfDay } from "../utils/timeOfDay";

export const DEFAULT_PUBLISH_TIME = "00:30";
export const DEFAULT_FETCH_TIME = "00:10";
export const DEFAULT_FETCH_INTERVAL_HOURS = 24;

const timeString = z
  .string()
  .refine((value) => parseTimeOfDay(value) !== null, { message: "must be a HH:MM time" });

const platformSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["youtube", "tiktok"]));

const channelSchema = z.object({
  id: z.string().trim().min(1),
  platform: platformSchema,
  enabled: z.boolean().default(true),
  credentialRef: z.string().trim().min(1),
  mediaFolderRef: z.string().trim().min(1).optional(),
  youtube: z
    .object({
      clientSecretsFile: z.string().trim().min(1).optional(),
      categoryId: z.union([z.string(), z.number()]).transform(String).default("22"),
      privacyStatus: z.enum(["public", "private", "unlisted"]).default("public"),
      madeForKids: z.boolean().default(false),
      scheduleMinutesFromNow: z.number().int().positive().optional()
    })
    .default({}),
  tiktok: z
    .object({
      disableComments: z.boolean().default(false),
      disableDuet: z.boolean().default(false),
      disableStitch: z.boolean().default(false)
    })
    .default({})
});

const schedulerSchema = z
  .object({
    timezone: z.string().trim().min(1).default("UTC"),
    dailyFetchTime: timeString.default(DEFAULT_FETCH_TIME),
    fetchIntervalHours: z.coerce.number().int().positive().default(DEFAULT_FETCH_INTERVAL_HOURS),
    dailyPublishTimes: z.union([timeString, z.array(timeString)]).optional(),
    dailyPublishTime: timeString.optional(),
    queueOrdering: z.enum(["score", "fifo"]).default("score"),
    refillQueueWhenEmpty: z.boolean().default(true)
  })
  .default({});

const scheduleDocumentSchema = z.object({
  channels: z.array(channelSchema).default([]),
  scheduler: schedulerSchema,
  shared: z
    .object({
      outputRoot: z.string().trim().min(1).default("output/scheduled"),
      audioFolder: z.string().trim().min(1).default("assets/audios")
    })
    .default({}),
  discovery: z.object({ command: z.string().trim().min(1).optional() }).default({}),
  generation: z
    .object({
      audioCommand: z.string().trim().min(1).optional(),
      videoCommand: z.string().trim().min(1).optional()
    })
    .default({})
});

type RawChannel = z.infer<typeof channelSchema>;
export type ScheduleDocument = z.input<typeof scheduleDocumentSchema>;

function toTimeOfDay(value: string): TimeOfDay {
  const parsed = parseTimeOfDay(value);
  if (!parsed) {
    throw new ConfigInvalidError([`scheduler: invalid time "${value}"`]);
  }
  return parsed;
}

/**
 * Приводит время публикации к каноническому списку.
 * Строка или пустой список заменяются одним значением (legacy dailyPublishTime или "00:30").
 */
export function normalizePublishTimes(
  publishTimes: string | readonly string[] | undefined,
  legacyPublishTime: string | undefined
): TimeOfDay[] {
  let values: readonly string[];
  if (typeof publishTimes === "string") {
    values = [publishTimes];
  } else if (publishTimes && publishTimes.length > 0) {
    values = publishTimes;
  } else {
    values = [legacyPublishTime ?? DEFAULT_PUBLISH_TIME];
  }

  const unique = new Map<string, TimeOfDay>();
  for (const value of values) {
    const time = toTimeOfDay(value);
    unique.set(formatTimeOfDay(time), time);
  }
  return [...unique.values()].sort(compareTimeOfDay);
}

function toChannelConfig(raw: RawChannel, index: number, issues: string[]): ChannelConfig | null {
  if (raw.platform === "youtube") {
    if (!raw.mediaFolderRef) {
      issues.push(`channels.${index} (${raw.id}): mediaFolderRef is required for youtube channels`);
      return null;
    }
    const primary: PrimaryChannelConfig = {
      id: raw.id,
      platform: "YOUTUBE_SHORTS",
      platformKind: "primary",
      enabled: raw.enabled,
      credentialRef: raw.credentialRef,
      mediaFolderRef: raw.mediaFolderRef,
      youtube: Object.freeze({ ...raw.youtube })
    };
    return Object.freeze(primary);
  }

  const secondary: SecondaryChannelConfig = {
    id: raw.id,
    platform: "TIKTOK",
    platformKind: "secondary",
    enabled: raw.enabled,
    credentialRef: raw.credentialRef,
    mediaFolderRef: raw.mediaFolderRef,
    tiktok: Object.freeze({ ...raw.tiktok })
  };
  return Object.freeze(secondary);
}

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

/**
 * Валидирует и нормализует уже разобранный JSON-документ.
 * Любая проблема - ConfigInvalidError со списком всех найденных ошибок.
 */
export function parseScheduleConfig(raw: unknown): ScheduleConfig {
  const parsed = scheduleDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(formatZodIssues(parsed.error), parsed.error);
  }

  const document = parsed.data;
  const issues: string[] = [];

  const seenIds = new Set<string>();
  const channels: ChannelConfig[] = [];
  document.channels.forEach((rawChannel, index) => {
    if (seenIds.has(rawChannel.id)) {
      issues.push(`channels.${index}: duplicate channel id "${rawChannel.id}"`);
      return;
    }
    seenIds.add(rawChannel.id);
    const channel = toChannelConfig(rawChannel, index, issues);
    if (channel) {
      channels.push(channel);
    }
  });

  const scheduler = document.scheduler;
  if (!IANAZone.isValidZone(scheduler.timezone)) {
    issues.push(`scheduler.timezone: unknown time zone "${scheduler.timezone}"`);
  }

  if (issues.length > 0) {
    throw new ConfigInvalidError(issues);
  }

  const timing: TimingPolicy = Object.freeze({
    publishTimes: Object.freeze(
      normalizePublishTimes(scheduler.dailyPublishTimes, scheduler.dailyPublishTime)
    ),
    fetchTime: toTimeOfDay(scheduler.dailyFetchTime),
    fetchIntervalHours: scheduler.fetchIntervalHours,
    timezone: scheduler.timezone
  });

  return {
    channels: Object.freeze(channels),
    timing,
    queueOrdering: scheduler.queueOrdering,
    refillQueueWhenEmpty: scheduler.refillQueueWhenEmpty,
    shared: document.shared,
    discovery: document.discovery,
    generation: document.generation
  };
}

/**
 * Читает конфигурацию из JSON-файла.
 */
export async function loadScheduleConfig(configPath: string): Promise<ScheduleConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigInvalidError(
      [`cannot read config file ${configPath}: ${getErrorMessage(error)}`],
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigInvalidError(
      [`config file ${configPath} is not valid JSON: ${getErrorMessage(error)}`],
      error
    );
  }

  return parseScheduleConfig(raw);
}
