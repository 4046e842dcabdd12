/**
 * Форматирует длительность для логов: "1h 2m 3s", "2m 3s" или "3s".
 * Отрицательные значения считаются нулём, доли секунды отбрасываются.
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Засекает время этапа. Возвращает функцию, которая отдаёт прошедшее время строкой.
 */
export function startTimer(): () => string {
  const startedAt = Date.now();
  return () => formatElapsed(Date.now() - startedAt);
}
