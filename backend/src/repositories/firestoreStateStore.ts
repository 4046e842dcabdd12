import type { SchedulerState } from "../types/pipeline";
import { DocumentStore, FieldOp } from "./documentStore";
import type { SchedulerStateStore } from "./stateStore";
import { QUEUE_ITEMS_COLLECTION } from "./queueRepository";

export const STATE_COLLECTION = "schedulerState";
export const STATE_DOC_ID = "default";

/**
 * Состояние планировщика в Firestore: документ schedulerState/default.
 * markConsumed в одной транзакции добавляет id и переводит элемент очереди в "consumed".
 */
export class FirestoreStateStore implements SchedulerStateStore {
  constructor(private readonly store: DocumentStore) {}

  async read(): Promise<SchedulerState> {
    const data = (await this.store.get(STATE_COLLECTION, STATE_DOC_ID)) ?? {};

    const lastFetchTime = data.lastFetchTime instanceof Date ? data.lastFetchTime : null;
    const consumedItemIds: unknown[] = Array.isArray(data.consumedItemIds) ? data.consumedItemIds : [];

    return {
      lastFetchTime,
      consumedItemIds: new Set(
        consumedItemIds.filter((id): id is string => typeof id === "string")
      )
    };
  }

  async recordFetch(at: Date): Promise<void> {
    await this.store.merge(STATE_COLLECTION, STATE_DOC_ID, { lastFetchTime: at });
  }

  async markConsumed(itemId: string): Promise<void> {
    await this.store.runTransaction(async (transaction) => {
      const item = await transaction.get(QUEUE_ITEMS_COLLECTION, itemId);
      transaction.merge(STATE_COLLECTION, STATE_DOC_ID, { consumedItemIds: FieldOp.arrayUnion(itemId) });
      if (item) {
        transaction.update(QUEUE_ITEMS_COLLECTION, itemId, {
          status: "consumed",
          consumedAt: FieldOp.serverTimestamp()
        });
      }
    });
  }
}
