import type {
  ChannelConfig,
  PrimaryChannelConfig,
  SecondaryChannelConfig,
  SupportedPlatform
} from "../types/channel";
import type { MediaRef, PublishMetadata, PublishResult } from "../types/pipeline";
import { Logger } from "../utils/logger";
import { classifyPublishError, describePublishError } from "../utils/publishErrors";

export interface PrimaryPublisher {
  publish(channel: PrimaryChannelConfig, media: MediaRef, metadata: PublishMetadata): Promise<PublishResult>;
}

export interface SecondaryPublisher {
  publish(channel: SecondaryChannelConfig, media: MediaRef, metadata: PublishMetadata): Promise<PublishResult>;
}

export interface ChannelPublishers {
  primary: PrimaryPublisher;
  secondary: SecondaryPublisher;
}

async function publishSafely(
  channelId: string,
  upload: () => Promise<PublishResult>
): Promise<PublishResult> {
  try {
    return await upload();
  } catch (error) {
    const errorKind = classifyPublishError(error);
    const message = describePublishError(error);
    Logger.error("[Channel] Publisher threw", { channelId, errorKind, error: message });
    return { success: false, errorKind, message };
  }
}

/**
 * Канал, для которого рендерится собственный вариант видео.
 */
export class PrimaryPlatformChannel {
  readonly kind: "primary" = "primary";

  constructor(
    readonly config: Readonly<PrimaryChannelConfig>,
    private readonly publisher: PrimaryPublisher
  ) {}

  get id(): string {
    return this.config.id;
  }

  get platform(): SupportedPlatform {
    return this.config.platform;
  }

  publish(media: MediaRef, metadata: PublishMetadata): Promise<PublishResult> {
    return publishSafely(this.config.id, () => this.publisher.publish(this.config, media, metadata));
  }
}

/**
 * Канал, который публикует уже отрендеренное видео primary-канала.
 */
export class SecondaryPlatformChannel {
  readonly kind: "secondary" = "secondary";

  constructor(
    readonly config: Readonly<SecondaryChannelConfig>,
    private readonly publisher: SecondaryPublisher
  ) {}

  get id(): string {
    return this.config.id;
  }

  get platform(): SupportedPlatform {
    return this.config.platform;
  }

  publish(media: MediaRef, metadata: PublishMetadata): Promise<PublishResult> {
    return publishSafely(this.config.id, () => this.publisher.publish(this.config, media, metadata));
  }
}

export type Channel = PrimaryPlatformChannel | SecondaryPlatformChannel;

/**
 * Строит каналы в порядке конфигурации, пропуская выключенные.
 */
export function buildChannels(configs: readonly ChannelConfig[], publishers: ChannelPublishers): Channel[] {
  const channels: Channel[] = [];
  for (const config of configs) {
    if (!config.enabled) {
      Logger.debug("[Channel] Skipping disabled channel", { channelId: config.id });
      continue;
    }
    if (config.platformKind === "primary") {
      channels.push(new PrimaryPlatformChannel(config, publishers.primary));
    } else {
      channels.push(new SecondaryPlatformChannel(config, publishers.secondary));
    }
  }
  return channels;
}
