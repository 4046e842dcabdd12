import type { PublishMetadata, QueueItem } from "../types/pipeline";
import { normalizeYoutubeTitle } from "./youtubeTitleNormalizer";

/**
 * Хэштеги: только строки, без пустых, с "#" в начале и без пробелов внутри.
 */
export function normalizeHashtags(hashtags: readonly unknown[] | undefined): string[] {
  const cleaned: string[] = [];
  for (const tag of hashtags ?? []) {
    if (typeof tag !== "string") {
      continue;
    }
    const trimmed = tag.trim();
    if (!trimmed) {
      continue;
    }
    cleaned.push(trimmed.startsWith("#") ? trimmed : `#${trimmed.replace(/\s+/g, "")}`);
  }
  return cleaned;
}

/**
 * Собирает title/description для публикации из элемента очереди.
 * Если discovery не подготовил тексты, используется заголовок истории.
 */
export function buildPublishMetadata(item: QueueItem): PublishMetadata {
  const hashtags = normalizeHashtags(item.metadata.hashtags);
  const hashText = hashtags.join(" ");

  const title = item.metadata.youtubeTitle || item.title;
  const youtubeDescription = item.metadata.youtubeDescription || item.title;
  const tiktokDescription = item.metadata.tiktokDescription || item.title;

  return {
    youtubeTitle: normalizeYoutubeTitle(title),
    youtubeDescription: `${youtubeDescription}\n\n${hashText}`.trim(),
    tiktokDescription: `${tiktokDescription} ${hashText}`.trim(),
    hashtags
  };
}
