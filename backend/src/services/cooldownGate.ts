const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Нужно ли запускать fetch сейчас.
 * force - всегда да; первый запуск (нет lastFetchTime) - да;
 * иначе да, если с последнего fetch прошло не меньше fetchIntervalHours.
 * Сама функция состояние не меняет: lastFetchTime записывает FetchCycle после успешного fetch.
 */
export function shouldFetch(
  now: Date,
  lastFetchTime: Date | null,
  fetchIntervalHours: number,
  force: boolean
): boolean {
  if (force || !lastFetchTime) {
    return true;
  }
  return now.getTime() - lastFetchTime.getTime() >= fetchIntervalHours * MS_PER_HOUR;
}

export function getNextAllowedFetchAt(lastFetchTime: Date | null, fetchIntervalHours: number): Date | null {
  if (!lastFetchTime) {
    return null;
  }
  return new Date(lastFetchTime.getTime() + fetchIntervalHours * MS_PER_HOUR);
}

export function getCooldownRemainingMs(
  now: Date,
  lastFetchTime: Date | null,
  fetchIntervalHours: number
): number {
  const nextAllowedAt = getNextAllowedFetchAt(lastFetchTime, fetchIntervalHours);
  if (!nextAllowedAt) {
    return 0;
  }
  return Math.max(0, nextAllowedAt.getTime() - now.getTime());
}
