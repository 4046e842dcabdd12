import * as fs from "fs/promises";
import type { ChannelConfig } from "../types/channel";
import { formatElapsed } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";
import type { Notifier } from "./notificationBridge";
import { getTokenExpiry, readYoutubeTokenFile, YoutubeTokenFile } from "./youtubePublisherService";

export type TokenStatus = "missing" | "unreadable" | "no-expiry" | "expired" | "expired-refreshable" | "valid";

export interface TokenCheckResult {
  channelId: string;
  tokenFile: string;
  status: TokenStatus;
  expiresAt?: Date;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Проверка OAuth-токенов YouTube при старте.
 * Истёкший токен без refresh_token - уведомление CredentialWarning, остальное только в лог.
 */
export async function checkYoutubeTokenExpiry(
  channels: readonly ChannelConfig[],
  notifier: Notifier,
  now: Date = new Date()
): Promise<TokenCheckResult[]> {
  const results: TokenCheckResult[] = [];

  for (const channel of channels) {
    if (!channel.enabled || channel.platformKind !== "primary") {
      continue;
    }
    const tokenFile = channel.credentialRef;
    const base = { channelId: channel.id, tokenFile };

    if (!(await exists(tokenFile))) {
      Logger.warn("[TokenCheck] Token file not found yet (created after first OAuth login)", base);
      results.push({ ...base, status: "missing" });
      continue;
    }

    let token: YoutubeTokenFile;
    try {
      token = await readYoutubeTokenFile(tokenFile);
    } catch (error) {
      Logger.warn("[TokenCheck] Could not read token file", { ...base, error: getErrorMessage(error) });
      results.push({ ...base, status: "unreadable" });
      continue;
    }

    const expiresAt = getTokenExpiry(token);
    if (!expiresAt) {
      Logger.warn("[TokenCheck] Token expiry not present or not parseable", base);
      results.push({ ...base, status: "no-expiry" });
      continue;
    }

    const hasRefreshToken = Boolean(token.refresh_token);
    const msLeft = expiresAt.getTime() - now.getTime();

    if (msLeft > 0) {
      const log = hasRefreshToken ? Logger.info : Logger.warn;
      log(`[TokenCheck] Access token expires in ${formatElapsed(msLeft)}`, {
        ...base,
        expiresAt: expiresAt.toISOString(),
        refreshToken: hasRefreshToken ? "present" : "missing"
      });
      results.push({ ...base, status: "valid", expiresAt });
      continue;
    }

    if (hasRefreshToken) {
      Logger.info("[TokenCheck] Access token expired, refresh_token present (auto-refresh expected)", {
        ...base,
        expiredAt: expiresAt.toISOString()
      });
      results.push({ ...base, status: "expired-refreshable", expiresAt });
      continue;
    }

    Logger.warn("[TokenCheck] Access token expired and no refresh_token found", {
      ...base,
      expiredAt: expiresAt.toISOString()
    });
    notifier.notify({
      type: "CredentialWarning",
      channelId: channel.id,
      platform: channel.platform,
      message: `Token file ${tokenFile} expired at ${expiresAt.toISOString()} and has no refresh_token`,
      at: now
    });
    results.push({ ...base, status: "expired", expiresAt });
  }

  return results;
}
