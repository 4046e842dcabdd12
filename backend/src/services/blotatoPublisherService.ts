import axios, { AxiosInstance } from "axios";
import type { SecondaryChannelConfig } from "../types/channel";
import type { MediaRef, PublishMetadata, PublishResult } from "../types/pipeline";
import { Logger } from "../utils/logger";
import {
  ChannelCredentialError,
  classifyPublishError,
  describePublishError,
  getHttpStatus
} from "../utils/publishErrors";

export const BLOTATO_BASE_URL = "https://backend.blotato.com/v2";

export type BlotatoHttpClient = Pick<AxiosInstance, "post">;

interface BlotatoMediaResponse {
  url?: string;
}

interface BlotatoPostResponse {
  id?: string;
  postSubmissionId?: string;
}

/**
 * Сервис для публикации видео в TikTok через Blotato API
 */
export class BlotatoPublisherService {
  private readonly apiKey: string;
  private readonly httpClient: BlotatoHttpClient;

  constructor(apiKey?: string, httpClient?: BlotatoHttpClient) {
    this.apiKey = apiKey || "";

    if (!this.apiKey) {
      Logger.warn("[Blotato] API key not provided, TikTok channels will fail with CredentialError");
    }

    this.httpClient =
      httpClient ??
      axios.create({
        baseURL: BLOTATO_BASE_URL,
        timeout: 60000, // 60 секунд для загрузки медиа
        headers: {
          "Content-Type": "application/json"
        }
      });
  }

  /**
   * Загружает медиа в Blotato и получает URL для публикации
   */
  async uploadMedia(mediaUrl: string): Promise<string> {
    if (!this.apiKey) {
      throw new ChannelCredentialError("BLOTATO_API_KEY_REQUIRED: Blotato API key is required");
    }

    Logger.info("[Blotato] Uploading media", { mediaUrl });

    const response = await this.httpClient.post<BlotatoMediaResponse>(
      "/media",
      { url: mediaUrl },
      { headers: { "blotato-api-key": this.apiKey } }
    );

    const uploadedUrl = response.data?.url;
    if (!uploadedUrl) {
      throw new Error("BLOTATO_MEDIA_UPLOAD_FAILED: Blotato did not return media URL");
    }

    Logger.info("[Blotato] Media uploaded", { mediaUrl: uploadedUrl });
    return uploadedUrl;
  }

  /**
   * Публикует видео канала в TikTok. Не бросает исключений: ошибки возвращаются в PublishResult.
   */
  async publish(
    channel: SecondaryChannelConfig,
    media: MediaRef,
    metadata: PublishMetadata
  ): Promise<PublishResult> {
    if (!media.publicUrl) {
      return {
        success: false,
        errorKind: "MediaNotPublic",
        message: "Media has no public URL (set PUBLIC_BASE_URL)"
      };
    }

    if (!this.apiKey) {
      return {
        success: false,
        errorKind: "CredentialError",
        message: "Blotato API key not configured"
      };
    }

    try {
      const mediaUrl = await this.uploadMedia(media.publicUrl);

      Logger.info("[Blotato] Publishing to TikTok", {
        channelId: channel.id,
        accountId: channel.credentialRef
      });

      const postData = {
        post: {
          target: {
            targetType: "tiktok",
            isYourBrand: false,
            disabledDuet: channel.tiktok.disableDuet,
            privacyLevel: "PUBLIC_TO_EVERYONE",
            isAiGenerated: true,
            disabledStitch: channel.tiktok.disableStitch,
            disabledComments: channel.tiktok.disableComments,
            isBrandedContent: false
          },
          content: {
            text: metadata.tiktokDescription,
            platform: "tiktok",
            mediaUrls: [mediaUrl]
          },
          accountId: channel.credentialRef
        }
      };

      const response = await this.httpClient.post<BlotatoPostResponse>("/posts", postData, {
        headers: { "blotato-api-key": this.apiKey }
      });

      const postId = response.data?.postSubmissionId ?? response.data?.id;

      Logger.info("[Blotato] Published to TikTok", { channelId: channel.id, postId });

      return { success: true, postId };
    } catch (error) {
      const errorKind = classifyPublishError(error);
      const message = describePublishError(error);
      Logger.error("[Blotato] Failed to publish to TikTok", {
        channelId: channel.id,
        errorKind,
        status: getHttpStatus(error),
        error: message
      });
      return { success: false, errorKind, message };
    }
  }
}
