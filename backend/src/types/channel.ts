// Типы каналов публикации и расписания

export type SupportedPlatform = "YOUTUBE_SHORTS" | "TIKTOK";

/**
 * primary - канал, для которого рендерится собственный вариант видео (YouTube).
 * secondary - канал, который переиспользует первое отрендеренное видео (TikTok).
 */
export type PlatformKind = "primary" | "secondary";

export const PLATFORM_KIND: Record<SupportedPlatform, PlatformKind> = {
  YOUTUBE_SHORTS: "primary",
  TIKTOK: "secondary"
};

export type YoutubePrivacyStatus = "public" | "private" | "unlisted";

export interface YoutubeUploadSettings {
  clientSecretsFile?: string;
  categoryId: string;
  privacyStatus: YoutubePrivacyStatus;
  madeForKids: boolean;
  scheduleMinutesFromNow?: number;
}

export interface TiktokPostSettings {
  disableComments: boolean;
  disableDuet: boolean;
  disableStitch: boolean;
}

interface ChannelConfigBase {
  id: string;
  enabled: boolean;
  /** YouTube: путь к файлу OAuth-токена. TikTok: accountId в Blotato. */
  credentialRef: string;
}

export interface PrimaryChannelConfig extends ChannelConfigBase {
  platform: "YOUTUBE_SHORTS";
  platformKind: "primary";
  /** Папка с фоновыми видео для рендера варианта канала */
  mediaFolderRef: string;
  youtube: YoutubeUploadSettings;
}

export interface SecondaryChannelConfig extends ChannelConfigBase {
  platform: "TIKTOK";
  platformKind: "secondary";
  mediaFolderRef?: string;
  tiktok: TiktokPostSettings;
}

export type ChannelConfig = Readonly<PrimaryChannelConfig> | Readonly<SecondaryChannelConfig>;

/** Время суток "HH:MM" в разобранном виде */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

export type QueueOrdering = "score" | "fifo";

export interface TimingPolicy {
  /** Отсортированы по возрастанию, без повторов, минимум один элемент */
  publishTimes: readonly TimeOfDay[];
  fetchTime: TimeOfDay;
  fetchIntervalHours: number;
  timezone: string;
}

export interface SharedSettings {
  outputRoot: string;
  audioFolder: string;
}

export interface DiscoverySettings {
  command?: string;
}

export interface GenerationSettings {
  audioCommand?: string;
  videoCommand?: string;
}

export interface ScheduleConfig {
  channels: readonly ChannelConfig[];
  timing: TimingPolicy;
  queueOrdering: QueueOrdering;
  refillQueueWhenEmpty: boolean;
  shared: SharedSettings;
  discovery: DiscoverySettings;
  generation: GenerationSettings;
}
