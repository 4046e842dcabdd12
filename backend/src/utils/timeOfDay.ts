import type { TimeOfDay } from "../types/channel";

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Разбирает строку "HH:MM". Возвращает null для некорректного значения.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  return a.hour * 60 + a.minute - (b.hour * 60 + b.minute);
}
