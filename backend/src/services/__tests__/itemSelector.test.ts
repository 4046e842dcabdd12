import { selectNext } from "../itemSelector";
import { makeItem } from "../../__tests__/helpers/fakes";

const day = (n: number) => new Date(Date.UTC(2026, 0, n));

describe("selectNext", () => {
  it("should report NoItemAvailable for an empty queue", () => {
    expect(selectNext([], new Set())).toEqual({ ok: false, reason: "NoItemAvailable" });
  });

  it("should pick the highest score first, older item on ties", () => {
    const queue = [
      makeItem("a", { score: 5, createdAt: day(3) }),
      makeItem("b", { score: 9, createdAt: day(4) }),
      makeItem("c", { score: 9, createdAt: day(2) })
    ];
    const result = selectNext(queue, new Set());
    expect(result.ok && result.item.id).toBe("c");
  });

  it("should fall back to insertion order on full ties", () => {
    const queue = [makeItem("first", { score: 1 }), makeItem("second", { score: 1 })];
    const result = selectNext(queue, new Set());
    expect(result.ok && result.item.id).toBe("first");
  });

  it("should order by creation time under fifo", () => {
    const queue = [
      makeItem("new", { score: 100, createdAt: day(5) }),
      makeItem("old", { score: 1, createdAt: day(1) })
    ];
    const result = selectNext(queue, new Set(), "fifo");
    expect(result.ok && result.item.id).toBe("old");
  });

  it("should skip consumed ids and non-queued items", () => {
    const queue = [
      makeItem("used", { score: 10 }),
      makeItem("done", { score: 8, status: "consumed" }),
      makeItem("next", { score: 1 })
    ];
    const result = selectNext(queue, new Set(["used"]));
    expect(result.ok && result.item.id).toBe("next");
  });

  it("should report NoItemAvailable when everything is consumed", () => {
    const queue = [makeItem("a"), makeItem("b")];
    expect(selectNext(queue, new Set(["a", "b"]))).toEqual({ ok: false, reason: "NoItemAvailable" });
  });

  it("should not reorder the input array", () => {
    const queue = [makeItem("a", { score: 1 }), makeItem("b", { score: 2 })];
    selectNext(queue, new Set());
    expect(queue.map((item) => item.id)).toEqual(["a", "b"]);
  });
});
