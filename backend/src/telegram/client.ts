import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import type { TelegramSettings } from "../config/env";
import { Logger } from "../utils/logger";

const CONNECT_TIMEOUT_MS = 30000;

function withTimeout<T>(promise: Promise<T>, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout after 30 seconds`)), CONNECT_TIMEOUT_MS);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Создаёт подключённый Telegram-клиент: бот (TELEGRAM_BOT_TOKEN) или пользовательская сессия.
 */
export async function createTelegramClient(settings: TelegramSettings): Promise<TelegramClient> {
  const session = new StringSession(settings.session ?? "");
  const client = new TelegramClient(session, settings.apiId, settings.apiHash, {
    connectionRetries: 5,
    // Используем TCP для большей стабильности
    useWSS: false
  });

  try {
    if (settings.botToken) {
      await withTimeout(client.start({ botAuthToken: settings.botToken }), "Telegram bot login");
    } else {
      await withTimeout(client.connect(), "Telegram connection");
    }
  } catch (error) {
    Logger.error("[Telegram] Failed to connect client", error);
    await client.disconnect().catch((disconnectError: unknown) => {
      Logger.warn("[Telegram] Error disconnecting client", disconnectError);
    });
    throw error;
  }

  return client;
}
