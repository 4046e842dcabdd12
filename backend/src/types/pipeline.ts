import type { PlatformKind, SupportedPlatform } from "./channel";

export interface QueueItemMetadata {
  youtubeTitle?: string;
  youtubeDescription?: string;
  tiktokDescription?: string;
  hashtags?: string[];
}

export type QueueItemStatus = "queued" | "consumed";

export interface QueueItem {
  id: string;
  title: string;
  content: string;
  score: number;
  createdAt: Date;
  metadata: QueueItemMetadata;
  status: QueueItemStatus;
}

export interface SchedulerState {
  lastFetchTime: Date | null;
  consumedItemIds: ReadonlySet<string>;
}

/**
 * Ссылка на сгенерированный файл (общая озвучка или вариант видео).
 * Живёт только в пределах одного цикла публикации.
 */
export interface MediaRef {
  id: string;
  path: string;
  publicUrl?: string;
}

export type ArtifactRef = MediaRef;

export type ChannelErrorKind =
  | "CredentialError"
  | "NetworkError"
  | "UploadError"
  | "GenerationFailed"
  | "MediaNotPublic"
  | "NoPrimaryVideo"
  | "Unknown";

export type PublishResult =
  | { success: true; postId?: string; postUrl?: string }
  | { success: false; errorKind: ChannelErrorKind; message: string };

export interface ChannelOutcome {
  channelId: string;
  platform: SupportedPlatform;
  platformKind: PlatformKind;
  attempted: boolean;
  success: boolean;
  errorKind?: ChannelErrorKind;
  message?: string;
  mediaId?: string;
  postId?: string;
  postUrl?: string;
}

export type CycleReport = readonly ChannelOutcome[];

export interface PublishMetadata {
  youtubeTitle: string;
  youtubeDescription: string;
  tiktokDescription: string;
  hashtags: string[];
}
