/**
 * Хранилище состояния планировщика: время последнего fetch и id использованных элементов.
 *
 * Писать в хранилище может только текущий цикл. Набор consumedItemIds только растёт.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { SchedulerState } from "../types/pipeline";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

export interface SchedulerStateStore {
  read(): Promise<SchedulerState>;
  /** Вызывается только после успешного завершения fetch */
  recordFetch(at: Date): Promise<void>;
  /** Идемпотентно добавляет id в набор использованных */
  markConsumed(itemId: string): Promise<void>;
}

const stateFileSchema = z.object({
  lastFetchTime: z.string().nullable().default(null),
  consumedItemIds: z.array(z.string()).default([])
});

type StateFileData = z.infer<typeof stateFileSchema>;

const EMPTY_STATE_FILE: StateFileData = { lastFetchTime: null, consumedItemIds: [] };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseLastFetchTime(value: string | null): Date | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    Logger.warn("[StateStore] lastFetchTime is not parseable, treating as first run", { value });
    return null;
  }
  return parsed;
}

/**
 * Состояние в локальном JSON-файле.
 * Запись идёт во временный файл и затем rename, поэтому частичная запись не видна.
 * Все обновления выстраиваются в одну цепочку, чтобы fetch и publish не затирали друг друга.
 */
export class FileStateStore implements SchedulerStateStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async read(): Promise<SchedulerState> {
    await this.writeChain;
    const data = await this.readFile();
    return {
      lastFetchTime: parseLastFetchTime(data.lastFetchTime),
      consumedItemIds: new Set(data.consumedItemIds)
    };
  }

  recordFetch(at: Date): Promise<void> {
    return this.update((data) => ({ ...data, lastFetchTime: at.toISOString() }));
  }

  markConsumed(itemId: string): Promise<void> {
    return this.update((data) =>
      data.consumedItemIds.includes(itemId)
        ? data
        : { ...data, consumedItemIds: [...data.consumedItemIds, itemId] }
    );
  }

  private update(mutate: (data: StateFileData) => StateFileData): Promise<void> {
    const next = this.writeChain.then(async () => {
      const current = await this.readFile();
      const updated = mutate(current);
      if (updated !== current) {
        await this.writeFile(updated);
      }
    });
    // Ошибка уже возвращена вызывающему через next; цепочка должна продолжить работу
    this.writeChain = next.catch((error: unknown) => {
      Logger.debug("[StateStore] Write failed, chain continues", { error: getErrorMessage(error) });
    });
    return next;
  }

  private async readFile(): Promise<StateFileData> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return EMPTY_STATE_FILE;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new Error(`STATE_FILE_CORRUPT: ${this.filePath}: ${getErrorMessage(error)}`);
    }

    const parsed = stateFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`STATE_FILE_CORRUPT: ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeFile(data: StateFileData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}
