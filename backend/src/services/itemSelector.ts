import type { QueueOrdering } from "../types/channel";
import type { QueueItem } from "../types/pipeline";

export type SelectionResult =
  | { ok: true; item: QueueItem }
  | { ok: false; reason: "NoItemAvailable" };

type IndexedItem = { item: QueueItem; index: number };
type Comparator = (a: IndexedItem, b: IndexedItem) => number;

const byCreatedAt: Comparator = (a, b) => a.item.createdAt.getTime() - b.item.createdAt.getTime();
const byInsertion: Comparator = (a, b) => a.index - b.index;

/**
 * Политики порядка очереди.
 * score - как ранжирует discovery: больший score первым, затем более старый элемент.
 * fifo - в порядке создания.
 * При равенстве всегда решает порядок вставки.
 */
const ORDERINGS: Record<QueueOrdering, Comparator[]> = {
  score: [(a, b) => b.item.score - a.item.score, byCreatedAt, byInsertion],
  fifo: [byCreatedAt, byInsertion]
};

function compareWith(comparators: Comparator[]): Comparator {
  return (a, b) => {
    for (const comparator of comparators) {
      const result = comparator(a, b);
      if (result !== 0) {
        return result;
      }
    }
    return 0;
  };
}

export function isEligible(item: QueueItem, consumedItemIds: ReadonlySet<string>): boolean {
  return item.status === "queued" && !consumedItemIds.has(item.id);
}

/**
 * Выбирает следующий элемент очереди, пропуская уже использованные.
 */
export function selectNext(
  queue: readonly QueueItem[],
  consumedItemIds: ReadonlySet<string>,
  ordering: QueueOrdering = "score"
): SelectionResult {
  const eligible = queue
    .map((item, index) => ({ item, index }))
    .filter(({ item }) => isEligible(item, consumedItemIds));

  if (eligible.length === 0) {
    return { ok: false, reason: "NoItemAvailable" };
  }

  const [first] = eligible.sort(compareWith(ORDERINGS[ordering]));
  return { ok: true, item: first.item };
}
