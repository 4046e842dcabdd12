import type { TelegramSettings } from "../config/env";
import { createTelegramClient } from "../telegram/client";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";
import type { NotificationMessage, NotificationTransport } from "./notificationBridge";

export interface TelegramMessenger {
  sendText(peer: string | number, text: string): Promise<void>;
  disconnect(): Promise<void>;
}

export type TelegramConnector = (settings: TelegramSettings) => Promise<TelegramMessenger>;

export const connectTelegramMessenger: TelegramConnector = async (settings) => {
  const client = await createTelegramClient(settings);
  return {
    async sendText(peer, text) {
      await client.sendMessage(peer, { message: text });
    },
    disconnect: () => client.disconnect()
  };
};

/**
 * Числовые chat id ("-100123...") передаются числом, @username - строкой
 */
export function toTelegramPeer(chatId: string): string | number {
  return /^-?\d+$/.test(chatId) ? Number(chatId) : chatId;
}

export function formatTelegramText(message: NotificationMessage): string {
  return `${message.subject}\n\n${message.body}`;
}

/**
 * Отправляет уведомления в Telegram. Клиент создаётся на каждую отправку и отключается после неё.
 */
export class TelegramNotificationTransport implements NotificationTransport {
  constructor(
    private readonly settings: TelegramSettings,
    private readonly connect: TelegramConnector = connectTelegramMessenger
  ) {}

  async send(recipients: readonly string[], message: NotificationMessage): Promise<void> {
    if (recipients.length === 0) {
      return;
    }

    const messenger = await this.connect(this.settings);
    const text = formatTelegramText(message);
    const failures: string[] = [];

    try {
      for (const chatId of recipients) {
        try {
          await messenger.sendText(toTelegramPeer(chatId), text);
        } catch (error) {
          Logger.warn("[Telegram] Failed to send notification", { chatId, error: getErrorMessage(error) });
          failures.push(chatId);
        }
      }
    } finally {
      await messenger.disconnect().catch((error: unknown) => {
        Logger.warn("[Telegram] Error disconnecting client", { error: getErrorMessage(error) });
      });
    }

    if (failures.length === recipients.length) {
      throw new Error(`TELEGRAM_SEND_FAILED: no recipient received the notification (${failures.join(", ")})`);
    }
  }
}
