/**
 * Максимальная длина title для YouTube Shorts (в символах, не в UTF-16 units).
 * YouTube принимает до 100 символов, оставляем запас.
 */
export const MAX_YOUTUBE_TITLE_LENGTH = 90;

const TRAILING_PUNCTUATION = /[.,;:!?\-—–]+$/;

/**
 * Длина строки в символах (эмодзи и суррогатные пары считаются за один)
 */
export function countTitleChars(value: string): number {
  return Array.from(value).length;
}

/**
 * Нормализует заголовок YouTube-ролика:
 * - схлопывает пробелы
 * - при превышении лимита обрезает по символам, убирает висячую пунктуацию и добавляет "…"
 */
export function normalizeYoutubeTitle(title: string): string {
  const clean = title.trim().replace(/\s+/g, " ");
  const chars = Array.from(clean);

  if (chars.length <= MAX_YOUTUBE_TITLE_LENGTH) {
    return clean;
  }

  const head = chars
    .slice(0, MAX_YOUTUBE_TITLE_LENGTH - 1)
    .join("")
    .trim()
    .replace(TRAILING_PUNCTUATION, "")
    .trim();

  return `${head}…`;
}
