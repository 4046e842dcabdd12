/**
 * Настройки окружения. Читаются один раз при старте (dotenv подключается в index.ts).
 */

export type StorageDriver = "file" | "firestore";

export interface TelegramSettings {
  apiId: number;
  apiHash: string;
  botToken?: string;
  session?: string;
}

export interface EnvSettings {
  storageDriver: StorageDriver;
  stateFile: string;
  queueFile: string;
  blotatoApiKey?: string;
  telegram: TelegramSettings | null;
  notifyChatIds: string[];
  notifySubjectPrefix: string;
  port: number;
  publicBaseUrl?: string;
  cronSecret?: string;
  allowedOrigins: string[];
  httpServerEnabled: boolean;
}

// Нормализуем origin/base URL (убираем завершающий слеш)
function stripTrailingSlash(value: string | undefined): string | undefined {
  if (!value || !value.trim()) {
    return undefined;
  }
  return value.trim().replace(/\/+$/, "");
}

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readTelegramSettings(env: NodeJS.ProcessEnv): TelegramSettings | null {
  const apiId = Number(env.TELEGRAM_API_ID);
  const apiHash = env.TELEGRAM_API_HASH?.trim() ?? "";
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim() || undefined;
  const session = env.TELEGRAM_SESSION?.trim() || undefined;

  if (!apiId || !apiHash || (!botToken && !session)) {
    return null;
  }
  return { apiId, apiHash, botToken, session };
}

export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const storageDriver: StorageDriver =
    (env.STORAGE_DRIVER || "").trim().toLowerCase() === "firestore" ? "firestore" : "file";

  return {
    storageDriver,
    stateFile: env.STATE_FILE?.trim() || "data/scheduler-state.json",
    queueFile: env.QUEUE_FILE?.trim() || "data/queue.json",
    blotatoApiKey: env.BLOTATO_API_KEY?.trim() || undefined,
    telegram: readTelegramSettings(env),
    notifyChatIds: splitList(env.NOTIFY_CHAT_IDS),
    notifySubjectPrefix: env.NOTIFY_SUBJECT_PREFIX?.trim() || "[StoryReel]",
    port: Number(env.PORT) || 8080,
    publicBaseUrl: stripTrailingSlash(env.PUBLIC_BASE_URL),
    cronSecret: env.CRON_SECRET?.trim() || undefined,
    allowedOrigins: splitList(env.FRONTEND_ORIGIN)
      .map(stripTrailingSlash)
      .filter((origin): origin is string => origin !== undefined),
    httpServerEnabled: env.ENABLE_HTTP_SERVER !== "false"
  };
}
