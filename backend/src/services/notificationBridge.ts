/**
 * Уведомления о событиях пайплайна. Доставка не блокирует и не ломает цикл публикации:
 * notify() возвращается сразу, ошибки транспорта только логируются.
 */

import type { SupportedPlatform } from "../types/channel";
import type { ChannelErrorKind } from "../types/pipeline";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

export type FatalStage = "fetch" | "publish" | "startup";

export type NotificationEvent =
  | {
      type: "ChannelUploadSucceeded";
      channelId: string;
      platform: SupportedPlatform;
      itemId: string;
      itemTitle: string;
      postId?: string;
      postUrl?: string;
      at: Date;
    }
  | {
      type: "ChannelUploadFailed";
      channelId: string;
      platform: SupportedPlatform;
      itemId: string;
      itemTitle: string;
      errorKind: ChannelErrorKind;
      message: string;
      at: Date;
    }
  | {
      type: "FatalPipelineError";
      stage: FatalStage;
      message: string;
      itemId?: string;
      at: Date;
    }
  | {
      type: "CredentialWarning";
      channelId: string;
      platform: SupportedPlatform;
      message: string;
      at: Date;
    };

export interface NotificationMessage {
  subject: string;
  body: string;
}

export interface NotificationTransport {
  send(recipients: readonly string[], message: NotificationMessage): Promise<void>;
}

export interface Notifier {
  notify(event: NotificationEvent): void;
}

const PLATFORM_LABEL: Record<SupportedPlatform, string> = {
  YOUTUBE_SHORTS: "YouTube",
  TIKTOK: "TikTok"
};

export function formatNotification(event: NotificationEvent, subjectPrefix: string): NotificationMessage {
  const time = `Time (UTC): ${event.at.toISOString()}`;

  switch (event.type) {
    case "ChannelUploadSucceeded": {
      const platform = PLATFORM_LABEL[event.platform];
      return {
        subject: `${subjectPrefix} Posted to ${platform} (${event.channelId})`,
        body: [
          "Status: SUCCESS",
          `Platform: ${platform}`,
          `Channel: ${event.channelId}`,
          `Link: ${event.postUrl ?? "Unavailable"}`,
          ...(event.postId ? [`Post ID: ${event.postId}`] : []),
          `Item: ${event.itemId}`,
          `Title: ${event.itemTitle}`,
          time
        ].join("\n")
      };
    }
    case "ChannelUploadFailed": {
      const platform = PLATFORM_LABEL[event.platform];
      return {
        subject: `${subjectPrefix} ERROR on ${platform} (${event.channelId})`,
        body: [
          "Status: ERROR",
          `Platform: ${platform}`,
          `Channel: ${event.channelId}`,
          `Item: ${event.itemId}`,
          `Title: ${event.itemTitle}`,
          `Error kind: ${event.errorKind}`,
          `Error: ${event.message}`,
          time
        ].join("\n")
      };
    }
    case "FatalPipelineError":
      return {
        subject: `${subjectPrefix} FATAL ${event.stage} error`,
        body: [
          "Status: FATAL",
          `Stage: ${event.stage}`,
          ...(event.itemId ? [`Item: ${event.itemId}`] : []),
          `Error: ${event.message}`,
          time
        ].join("\n")
      };
    case "CredentialWarning": {
      const platform = PLATFORM_LABEL[event.platform];
      return {
        subject: `${subjectPrefix} ${platform} credentials need attention (${event.channelId})`,
        body: [
          "Status: WARNING",
          `Platform: ${platform}`,
          `Channel: ${event.channelId}`,
          `Details: ${event.message}`,
          time
        ].join("\n")
      };
    }
  }
}

export class NotificationBridge implements Notifier {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly transport: NotificationTransport | null,
    private readonly recipients: readonly string[],
    private readonly subjectPrefix = "[StoryReel]"
  ) {}

  notify(event: NotificationEvent): void {
    const message = formatNotification(event, this.subjectPrefix);

    if (!this.transport || this.recipients.length === 0) {
      Logger.info("[Notify] Skipped (no transport or recipients)", { subject: message.subject });
      return;
    }

    const delivery = this.transport
      .send(this.recipients, message)
      .then(() => {
        Logger.info("[Notify] Sent", { subject: message.subject, recipients: this.recipients.length });
      })
      .catch((error: unknown) => {
        Logger.warn("[Notify] Delivery failed", { subject: message.subject, error: getErrorMessage(error) });
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /**
   * Ждёт завершения всех отправленных уведомлений (перед выходом из процесса).
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
