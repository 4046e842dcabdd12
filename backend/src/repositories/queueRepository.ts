/**
 * Источник очереди элементов, которые наполняет внешний discovery.
 * Элементы возвращаются в порядке вставки; выбор следующего делает itemSelector.
 */

import * as fs from "fs/promises";
import { z } from "zod";
import type { QueueItem } from "../types/pipeline";
import { Logger } from "../utils/logger";
import type { DocumentStore } from "./documentStore";
import { getErrorMessage } from "../utils/pipelineErrors";

export const QUEUE_ITEMS_COLLECTION = "queueItems";

export interface QueueSource {
  listItems(): Promise<QueueItem[]>;
}

const queueItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  title: z.string(),
  content: z.string().default(""),
  score: z.number().default(0),
  createdAt: z.coerce.date().optional(),
  metadata: z
    .object({
      youtubeTitle: z.string().optional(),
      youtubeDescription: z.string().optional(),
      tiktokDescription: z.string().optional(),
      hashtags: z
        .array(z.unknown())
        .transform((tags) => tags.filter((tag): tag is string => typeof tag === "string"))
        .optional()
    })
    .default({}),
  status: z.enum(["queued", "consumed"]).default("queued")
});

/**
 * Разбирает сырую запись очереди. Некорректные записи пропускаются с предупреждением.
 */
export function parseQueueItem(raw: unknown): QueueItem | null {
  const parsed = queueItemSchema.safeParse(raw);
  if (!parsed.success) {
    Logger.warn("[Queue] Skipping invalid queue item", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
    return null;
  }
  const item = parsed.data;
  return {
    ...item,
    createdAt: item.createdAt ?? new Date(0)
  };
}

function parseQueueItems(rawItems: readonly unknown[]): QueueItem[] {
  const items: QueueItem[] = [];
  for (const raw of rawItems) {
    const item = parseQueueItem(raw);
    if (item) {
      items.push(item);
    }
  }
  return items;
}

/**
 * Очередь в JSON-файле (массив элементов), который пишет discovery-команда.
 */
export class FileQueueSource implements QueueSource {
  constructor(private readonly filePath: string) {}

  async listItems(): Promise<QueueItem[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        Logger.info("[Queue] Queue file not found, queue is empty", { filePath: this.filePath });
        return [];
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new Error(`QUEUE_FILE_CORRUPT: ${this.filePath}: ${getErrorMessage(error)}`);
    }
    if (!Array.isArray(raw)) {
      throw new Error(`QUEUE_FILE_CORRUPT: ${this.filePath}: expected a JSON array`);
    }
    return parseQueueItems(raw);
  }
}

/**
 * Очередь в коллекции Firestore queueItems (id документа = id элемента).
 * Коллекция читается целиком и сортируется по createdAt в памяти:
 * запрос с orderBy пропустил бы документы без этого поля.
 */
export class FirestoreQueueSource implements QueueSource {
  constructor(private readonly store: DocumentStore) {}

  async listItems(): Promise<QueueItem[]> {
    const documents = await this.store.list(QUEUE_ITEMS_COLLECTION);
    const items = parseQueueItems(documents.map((doc) => ({ ...doc.fields, id: doc.id })));
    // sort стабилен: при равном createdAt сохраняется порядок документов
    return items.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
