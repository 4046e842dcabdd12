/**
 * Раздача одного элемента очереди по каналам.
 *
 * 1. Одна общая озвучка на элемент.
 * 2. primary-каналы по порядку конфигурации: рендер своего варианта и публикация.
 *    Первый успешно отрендеренный вариант сохраняется.
 * 3. secondary-каналы публикуют сохранённый вариант без рендера.
 * Ошибка одного канала не прерывает остальные.
 */

import type { ChannelOutcome, CycleReport, MediaRef, PublishMetadata, QueueItem } from "../types/pipeline";
import { startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage, PipelineError } from "../utils/pipelineErrors";
import { buildPublishMetadata } from "../utils/publishMetadata";
import { classifyPublishError } from "../utils/publishErrors";
import type { Channel, PrimaryPlatformChannel, SecondaryPlatformChannel } from "./channels";
import type { MediaGenerator } from "./mediaGenerationService";
import type { Notifier } from "./notificationBridge";

export type FanoutResult =
  | { ok: true; report: CycleReport }
  | { ok: false; error: PipelineError; report: CycleReport };

export interface FanoutDeps {
  generator: MediaGenerator;
  notifier: Notifier;
  now?: () => Date;
}

function notAttempted(channel: Channel, message: string): ChannelOutcome {
  return {
    channelId: channel.id,
    platform: channel.platform,
    platformKind: channel.kind,
    attempted: false,
    success: false,
    errorKind: "NoPrimaryVideo",
    message
  };
}

export class FanoutCoordinator {
  private readonly now: () => Date;

  constructor(private readonly deps: FanoutDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(item: QueueItem, channels: readonly Channel[]): Promise<FanoutResult> {
    const primaries = channels.filter((channel): channel is PrimaryPlatformChannel => channel.kind === "primary");
    const secondaries = channels.filter(
      (channel): channel is SecondaryPlatformChannel => channel.kind === "secondary"
    );

    if (primaries.length === 0) {
      Logger.warn("[Fanout] No enabled primary channel, nothing to render", { itemId: item.id });
      return {
        ok: true,
        report: secondaries.map((channel) => notAttempted(channel, "No primary channel is enabled"))
      };
    }

    try {
      return await this.distribute(item, primaries, secondaries, channels);
    } finally {
      // Остатки генерации (в том числе после сбоя) не копятся в outputRoot
      await this.deps.generator.cleanupItem(item);
    }
  }

  private async distribute(
    item: QueueItem,
    primaries: readonly PrimaryPlatformChannel[],
    secondaries: readonly SecondaryPlatformChannel[],
    channels: readonly Channel[]
  ): Promise<FanoutResult> {
    const elapsed = startTimer();
    let audio: MediaRef;
    try {
      audio = await this.deps.generator.generateSharedAudio(item);
    } catch (error) {
      Logger.error("[Fanout] Shared audio generation failed", { itemId: item.id, error: getErrorMessage(error) });
      return {
        ok: false,
        error: new PipelineError("ArtifactGenerationFailed", `shared audio: ${getErrorMessage(error)}`, error),
        report: []
      };
    }

    const metadata = buildPublishMetadata(item);
    const outcomes = new Map<string, ChannelOutcome>();
    let retained: MediaRef | null = null;

    try {
      for (const channel of primaries) {
        const { outcome, media } = await this.runPrimary(item, channel, audio, metadata);
        outcomes.set(channel.id, outcome);

        if (!media) {
          continue;
        }
        if (!retained) {
          retained = media;
          Logger.info("[Fanout] Retained video for secondary channels", {
            itemId: item.id,
            channelId: channel.id,
            mediaId: media.id
          });
        } else {
          await this.deps.generator.release(media);
        }
      }

      for (const channel of secondaries) {
        outcomes.set(
          channel.id,
          retained
            ? await this.runSecondary(item, channel, retained, metadata)
            : notAttempted(channel, "No primary video was generated")
        );
      }
    } finally {
      if (retained) {
        await this.deps.generator.release(retained);
      }
      await this.deps.generator.release(audio);
    }

    // Отчёт в порядке конфигурации каналов
    const report = channels.flatMap((channel) => {
      const outcome = outcomes.get(channel.id);
      return outcome ? [outcome] : [];
    });

    Logger.info("[Fanout] Completed", {
      itemId: item.id,
      succeeded: report.filter((outcome) => outcome.success).length,
      failed: report.filter((outcome) => outcome.attempted && !outcome.success).length,
      skipped: report.filter((outcome) => !outcome.attempted).length,
      elapsed: elapsed()
    });

    return { ok: true, report };
  }

  private async runPrimary(
    item: QueueItem,
    channel: PrimaryPlatformChannel,
    audio: MediaRef,
    metadata: PublishMetadata
  ): Promise<{ outcome: ChannelOutcome; media: MediaRef | null }> {
    let media: MediaRef;
    try {
      media = await this.deps.generator.generateVideo(item, channel.config, audio);
    } catch (error) {
      const message = getErrorMessage(error);
      Logger.error("[Fanout] Video generation failed", { itemId: item.id, channelId: channel.id, error: message });
      const outcome: ChannelOutcome = {
        channelId: channel.id,
        platform: channel.platform,
        platformKind: channel.kind,
        attempted: true,
        success: false,
        errorKind: "GenerationFailed",
        message
      };
      this.emit(item, outcome);
      return { outcome, media: null };
    }

    const outcome = await this.publish(item, channel, media, metadata);
    return { outcome, media };
  }

  private runSecondary(
    item: QueueItem,
    channel: SecondaryPlatformChannel,
    media: MediaRef,
    metadata: PublishMetadata
  ): Promise<ChannelOutcome> {
    return this.publish(item, channel, media, metadata);
  }

  private async publish(
    item: QueueItem,
    channel: Channel,
    media: MediaRef,
    metadata: PublishMetadata
  ): Promise<ChannelOutcome> {
    const base = {
      channelId: channel.id,
      platform: channel.platform,
      platformKind: channel.kind,
      attempted: true,
      mediaId: media.id
    };

    let outcome: ChannelOutcome;
    try {
      const result = await channel.publish(media, metadata);
      outcome = result.success
        ? { ...base, success: true, postId: result.postId, postUrl: result.postUrl }
        : { ...base, success: false, errorKind: result.errorKind, message: result.message };
    } catch (error) {
      outcome = { ...base, success: false, errorKind: classifyPublishError(error), message: getErrorMessage(error) };
    }

    Logger.info(`[Fanout] ${outcome.success ? "Published" : "Publish failed"}`, {
      itemId: item.id,
      channelId: channel.id,
      platform: channel.platform,
      postUrl: outcome.postUrl,
      errorKind: outcome.errorKind
    });
    this.emit(item, outcome);
    return outcome;
  }

  private emit(item: QueueItem, outcome: ChannelOutcome): void {
    const at = this.now();
    if (outcome.success) {
      this.deps.notifier.notify({
        type: "ChannelUploadSucceeded",
        channelId: outcome.channelId,
        platform: outcome.platform,
        itemId: item.id,
        itemTitle: item.title,
        postId: outcome.postId,
        postUrl: outcome.postUrl,
        at
      });
      return;
    }
    this.deps.notifier.notify({
      type: "ChannelUploadFailed",
      channelId: outcome.channelId,
      platform: outcome.platform,
      itemId: item.id,
      itemTitle: item.title,
      errorKind: outcome.errorKind ?? "Unknown",
      message: outcome.message ?? "",
      at
    });
  }
}
