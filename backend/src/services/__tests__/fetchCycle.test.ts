import type { DiscoveryResult, DiscoveryService } from "../discoveryService";
import { runFetchCycle } from "../fetchCycle";
import { InMemoryStateStore, RecordingNotifier } from "../../__tests__/helpers/fakes";

class StubDiscovery implements DiscoveryService {
  calls = 0;

  constructor(private readonly result: DiscoveryResult | Error) {}

  async fetchAndQueueItems(): Promise<DiscoveryResult> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

const NOW = new Date("2026-03-02T00:10:00.000Z");

describe("runFetchCycle", () => {
  it("should fetch on first run and record the fetch time", async () => {
    const stateStore = new InMemoryStateStore();
    const discovery = new StubDiscovery({ ok: true, count: 4 });

    const result = await runFetchCycle(
      { discovery, stateStore, notifier: new RecordingNotifier(), fetchIntervalHours: 24 },
      { force: false, now: NOW }
    );

    expect(result).toEqual({ status: "fetched", count: 4, fetchedAt: NOW });
    expect(stateStore.recordFetchCalls).toEqual([NOW]);
  });

  it("should skip during the cooldown without touching state", async () => {
    const lastFetchTime = new Date("2026-03-01T12:00:00.000Z");
    const stateStore = new InMemoryStateStore({ lastFetchTime });
    const discovery = new StubDiscovery({ ok: true, count: 1 });

    const result = await runFetchCycle(
      { discovery, stateStore, notifier: new RecordingNotifier(), fetchIntervalHours: 24 },
      { force: false, now: NOW }
    );

    expect(result).toEqual({ status: "skipped", nextAllowedAt: new Date("2026-03-02T12:00:00.000Z") });
    expect(discovery.calls).toBe(0);
    expect(stateStore.recordFetchCalls).toEqual([]);
  });

  it("should bypass the cooldown when forced", async () => {
    const stateStore = new InMemoryStateStore({ lastFetchTime: new Date("2026-03-01T23:00:00.000Z") });
    const discovery = new StubDiscovery({ ok: true, count: 2 });

    const result = await runFetchCycle(
      { discovery, stateStore, notifier: new RecordingNotifier(), fetchIntervalHours: 24 },
      { force: true, now: NOW }
    );

    expect(result.status).toBe("fetched");
    expect(stateStore.lastFetchTime).toEqual(NOW);
  });

  it("should keep the cooldown untouched and notify when discovery fails", async () => {
    const lastFetchTime = new Date("2026-02-01T00:00:00.000Z");
    const stateStore = new InMemoryStateStore({ lastFetchTime });
    const notifier = new RecordingNotifier();

    const result = await runFetchCycle(
      {
        discovery: new StubDiscovery({ ok: false, error: "source unavailable" }),
        stateStore,
        notifier,
        fetchIntervalHours: 24
      },
      { force: false, now: NOW }
    );

    expect(result.status).toBe("failed");
    expect(stateStore.lastFetchTime).toEqual(lastFetchTime);
    expect(notifier.events).toHaveLength(1);
    expect(notifier.events[0]).toMatchObject({
      type: "FatalPipelineError",
      stage: "fetch",
      message: "FetchFailed: source unavailable"
    });
  });

  it("should treat a throwing discovery like a failed one", async () => {
    const stateStore = new InMemoryStateStore();

    const result = await runFetchCycle(
      {
        discovery: new StubDiscovery(new Error("spawn ENOENT")),
        stateStore,
        notifier: new RecordingNotifier(),
        fetchIntervalHours: 24
      },
      { force: true, now: NOW }
    );

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error.code).toBe("FetchFailed");
    }
    expect(stateStore.recordFetchCalls).toEqual([]);
  });
});
