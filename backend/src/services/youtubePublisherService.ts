/**
 * Публикация на YouTube (primary-платформа) через YouTube Data API v3.
 *
 * credentialRef канала - путь к файлу OAuth-токена (authorized user JSON):
 * { token, refresh_token, client_id, client_secret, expiry }.
 * Сам OAuth consent flow вне этого сервиса: файл должен быть создан заранее.
 */

import * as fs from "fs";
import * as fsp from "fs/promises";
import { google } from "googleapis";
import { z } from "zod";
import type { PrimaryChannelConfig } from "../types/channel";
import type { MediaRef, PublishMetadata, PublishResult } from "../types/pipeline";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";
import {
  ChannelCredentialError,
  classifyPublishError,
  describePublishError
} from "../utils/publishErrors";

export const YOUTUBE_UPLOAD_SCOPE = "https://www.googleapis.com/auth/youtube.upload";

const tokenFileSchema = z
  .object({
    token: z.string().nullable().optional(),
    refresh_token: z.string().nullable().optional(),
    client_id: z.string().optional(),
    client_secret: z.string().optional(),
    expiry: z.string().nullable().optional()
  })
  .passthrough();

export type YoutubeTokenFile = z.infer<typeof tokenFileSchema>;

const clientSecretsSchema = z.union([
  z.object({ installed: z.object({ client_id: z.string(), client_secret: z.string() }) }),
  z.object({ web: z.object({ client_id: z.string(), client_secret: z.string() }) })
]);

export interface YoutubeCredentials {
  clientId: string;
  clientSecret: string;
  accessToken?: string;
  refreshToken?: string;
  expiryDate?: number;
  /** Вызывается, когда библиотека обновила access token */
  onTokensRefreshed: (tokens: { accessToken?: string; refreshToken?: string; expiryDate?: number }) => void;
}

export interface YoutubeUploadRequest {
  filePath: string;
  title: string;
  description: string;
  tags: string[];
  categoryId: string;
  privacyStatus: string;
  madeForKids: boolean;
  publishAt?: string;
}

export interface YoutubeVideoUploader {
  /** Возвращает id загруженного видео */
  upload(request: YoutubeUploadRequest): Promise<string | null | undefined>;
}

export type YoutubeUploaderFactory = (credentials: YoutubeCredentials) => YoutubeVideoUploader;

function optionalString(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export const googleApisUploaderFactory: YoutubeUploaderFactory = (credentials) => {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({
    access_token: credentials.accessToken,
    refresh_token: credentials.refreshToken,
    expiry_date: credentials.expiryDate,
    scope: YOUTUBE_UPLOAD_SCOPE
  });
  auth.on("tokens", (tokens) => {
    credentials.onTokensRefreshed({
      accessToken: optionalString(tokens.access_token),
      refreshToken: optionalString(tokens.refresh_token),
      expiryDate: tokens.expiry_date ?? undefined
    });
  });

  const youtube = google.youtube({ version: "v3", auth });

  return {
    async upload(request) {
      const response = await youtube.videos.insert({
        part: ["snippet", "status"],
        requestBody: {
          snippet: {
            title: request.title,
            description: request.description,
            tags: request.tags,
            categoryId: request.categoryId
          },
          status: {
            privacyStatus: request.privacyStatus,
            selfDeclaredMadeForKids: request.madeForKids,
            publishAt: request.publishAt
          }
        },
        media: {
          body: fs.createReadStream(request.filePath)
        }
      });
      return response.data.id;
    }
  };
};

export function buildYoutubeShortsLink(videoId: string): string {
  return `https://www.youtube.com/shorts/${videoId}`;
}

/**
 * Читает файл OAuth-токена канала. Отсутствующий или битый файл - ошибка учётных данных.
 */
export async function readYoutubeTokenFile(tokenFile: string): Promise<YoutubeTokenFile> {
  let text: string;
  try {
    text = await fsp.readFile(tokenFile, "utf-8");
  } catch (error) {
    throw new ChannelCredentialError(`YouTube token file is not readable: ${tokenFile} (${getErrorMessage(error)})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ChannelCredentialError(`YouTube token file is not valid JSON: ${tokenFile}`);
  }

  const parsed = tokenFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelCredentialError(`YouTube token file has unexpected shape: ${tokenFile}`);
  }
  return parsed.data;
}

async function readClientSecrets(clientSecretsFile: string): Promise<{ clientId: string; clientSecret: string }> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fsp.readFile(clientSecretsFile, "utf-8"));
  } catch (error) {
    throw new ChannelCredentialError(
      `YouTube client secrets file is not readable: ${clientSecretsFile} (${getErrorMessage(error)})`
    );
  }
  const parsed = clientSecretsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelCredentialError(`YouTube client secrets file has unexpected shape: ${clientSecretsFile}`);
  }
  const secrets = "installed" in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: secrets.client_id, clientSecret: secrets.client_secret };
}

function parseExpiry(expiry: string | null | undefined): number | undefined {
  if (!expiry) {
    return undefined;
  }
  // expiry без часового пояса считается UTC
  const normalized = /[zZ]|[+-]\d{2}:?\d{2}$/.test(expiry) ? expiry : `${expiry}Z`;
  const time = Date.parse(normalized);
  return Number.isNaN(time) ? undefined : time;
}

export function getTokenExpiry(token: YoutubeTokenFile): Date | null {
  const time = parseExpiry(token.expiry);
  return time === undefined ? null : new Date(time);
}

export class YoutubePublisherService {
  constructor(
    private readonly uploaderFactory: YoutubeUploaderFactory = googleApisUploaderFactory,
    private readonly now: () => Date = () => new Date()
  ) {}

  private async resolveCredentials(channel: PrimaryChannelConfig): Promise<YoutubeCredentials> {
    const tokenFile = channel.credentialRef;
    const token = await readYoutubeTokenFile(tokenFile);

    let clientId = token.client_id;
    let clientSecret = token.client_secret;
    if ((!clientId || !clientSecret) && channel.youtube.clientSecretsFile) {
      ({ clientId, clientSecret } = await readClientSecrets(channel.youtube.clientSecretsFile));
    }
    if (!clientId || !clientSecret) {
      throw new ChannelCredentialError(
        `YouTube client id/secret not found in ${tokenFile} or youtube.clientSecretsFile`
      );
    }
    if (!token.token && !token.refresh_token) {
      throw new ChannelCredentialError(`YouTube token file has neither token nor refresh_token: ${tokenFile}`);
    }

    return {
      clientId,
      clientSecret,
      accessToken: optionalString(token.token),
      refreshToken: optionalString(token.refresh_token),
      expiryDate: parseExpiry(token.expiry),
      onTokensRefreshed: (tokens) => {
        this.persistRefreshedTokens(tokenFile, token, tokens).catch((error: unknown) => {
          Logger.warn("[YouTube] Failed to persist refreshed token", {
            channelId: channel.id,
            tokenFile,
            error: getErrorMessage(error)
          });
        });
      }
    };
  }

  private async persistRefreshedTokens(
    tokenFile: string,
    current: YoutubeTokenFile,
    tokens: { accessToken?: string; refreshToken?: string; expiryDate?: number }
  ): Promise<void> {
    const updated: YoutubeTokenFile = {
      ...current,
      token: tokens.accessToken ?? current.token,
      refresh_token: tokens.refreshToken ?? current.refresh_token,
      expiry: tokens.expiryDate !== undefined ? new Date(tokens.expiryDate).toISOString() : current.expiry
    };
    await fsp.writeFile(tokenFile, JSON.stringify(updated, null, 2), "utf-8");
    Logger.info("[YouTube] Refreshed access token saved", { tokenFile });
  }

  private buildPublishAt(minutesFromNow: number | undefined): string | undefined {
    if (!minutesFromNow || minutesFromNow <= 0) {
      return undefined;
    }
    const publishAt = new Date(this.now().getTime() + minutesFromNow * 60_000);
    publishAt.setUTCMilliseconds(0);
    return publishAt.toISOString().replace(".000Z", "Z");
  }

  async publish(
    channel: PrimaryChannelConfig,
    media: MediaRef,
    metadata: PublishMetadata
  ): Promise<PublishResult> {
    try {
      const credentials = await this.resolveCredentials(channel);
      const uploader = this.uploaderFactory(credentials);
      const publishAt = this.buildPublishAt(channel.youtube.scheduleMinutesFromNow);

      Logger.info("[YouTube] Uploading video", {
        channelId: channel.id,
        filePath: media.path,
        title: metadata.youtubeTitle,
        publishAt
      });

      const videoId = await uploader.upload({
        filePath: media.path,
        title: metadata.youtubeTitle,
        description: metadata.youtubeDescription,
        tags: metadata.hashtags.map((tag) => tag.replace(/^#/, "")),
        categoryId: channel.youtube.categoryId,
        // Отложенная публикация возможна только для private-видео
        privacyStatus: publishAt ? "private" : channel.youtube.privacyStatus,
        madeForKids: channel.youtube.madeForKids,
        publishAt
      });

      if (!videoId) {
        return { success: false, errorKind: "UploadError", message: "YouTube did not return a video id" };
      }

      Logger.info("[YouTube] Video uploaded", { channelId: channel.id, videoId });
      return { success: true, postId: videoId, postUrl: buildYoutubeShortsLink(videoId) };
    } catch (error) {
      const errorKind = classifyPublishError(error);
      const message = describePublishError(error);
      Logger.error("[YouTube] Upload failed", { channelId: channel.id, errorKind, error: message });
      return { success: false, errorKind, message };
    }
  }
}
