import {
  computeNextTrigger,
  CronScheduleFn,
  JobScheduler,
  listTriggersBetween,
  toDailyCronExpression
} from "../jobScheduler";
import type { TimeOfDay, TimingPolicy } from "../../types/channel";
import { RecordingNotifier } from "../../__tests__/helpers/fakes";

const FIVE_TIMES: TimeOfDay[] = [
  { hour: 3, minute: 0 },
  { hour: 9, minute: 0 },
  { hour: 12, minute: 0 },
  { hour: 18, minute: 0 },
  { hour: 21, minute: 30 }
];

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve: () => resolve() };
}

function fakeCron() {
  const registered: Array<{ expression: string; timezone: string; callback: () => void; stopped: boolean }> = [];
  const schedule: CronScheduleFn = (expression, callback, options) => {
    const entry = { expression, timezone: options.timezone, callback, stopped: false };
    registered.push(entry);
    return {
      stop: () => {
        entry.stopped = true;
      }
    };
  };
  return { registered, schedule };
}

const timing: TimingPolicy = {
  publishTimes: FIVE_TIMES,
  fetchTime: { hour: 0, minute: 10 },
  fetchIntervalHours: 24,
  timezone: "UTC"
};

describe("toDailyCronExpression", () => {
  it("should build a daily cron expression", () => {
    expect(toDailyCronExpression({ hour: 3, minute: 0 })).toBe("0 3 * * *");
    expect(toDailyCronExpression({ hour: 21, minute: 30 })).toBe("30 21 * * *");
  });
});

describe("computeNextTrigger", () => {
  it("should pick the next time later the same day", () => {
    const next = computeNextTrigger(FIVE_TIMES, new Date("2026-03-01T10:00:00.000Z"), "UTC");
    expect(next.toISOString()).toBe("2026-03-01T12:00:00.000Z");
  });

  it("should be strictly after now", () => {
    const next = computeNextTrigger(FIVE_TIMES, new Date("2026-03-01T12:00:00.000Z"), "UTC");
    expect(next.toISOString()).toBe("2026-03-01T18:00:00.000Z");
  });

  it("should wrap to the first time of the next day", () => {
    const next = computeNextTrigger(FIVE_TIMES, new Date("2026-03-01T22:00:00.000Z"), "UTC");
    expect(next.toISOString()).toBe("2026-03-02T03:00:00.000Z");
  });

  it("should evaluate times in the policy timezone", () => {
    // 08:00 в Нью-Йорке (EST, UTC-5)
    const next = computeNextTrigger([{ hour: 9, minute: 0 }], new Date("2026-01-15T13:00:00.000Z"), "America/New_York");
    expect(next.toISOString()).toBe("2026-01-15T14:00:00.000Z");
  });

  it("should reject an empty list", () => {
    expect(() => computeNextTrigger([], new Date(), "UTC")).toThrow("publishTimes must not be empty");
  });
});

describe("listTriggersBetween", () => {
  it("should produce one trigger per publish time over a day", () => {
    const triggers = listTriggersBetween(
      FIVE_TIMES,
      new Date("2026-03-01T00:00:00.000Z"),
      new Date("2026-03-02T00:00:00.000Z"),
      "UTC"
    );
    expect(triggers.map((trigger) => trigger.toISOString())).toEqual([
      "2026-03-01T03:00:00.000Z",
      "2026-03-01T09:00:00.000Z",
      "2026-03-01T12:00:00.000Z",
      "2026-03-01T18:00:00.000Z",
      "2026-03-01T21:30:00.000Z"
    ]);
  });

  it("should include the window end and exclude the window start", () => {
    const triggers = listTriggersBetween(
      [{ hour: 3, minute: 0 }],
      new Date("2026-03-01T03:00:00.000Z"),
      new Date("2026-03-02T03:00:00.000Z"),
      "UTC"
    );
    expect(triggers.map((trigger) => trigger.toISOString())).toEqual(["2026-03-02T03:00:00.000Z"]);
  });

  it("should keep a time that falls into the spring-forward gap", () => {
    // 29.03.2026 в Берлине 02:00-03:00 не существует, 02:30 сдвигается на 03:30 CEST
    const triggers = listTriggersBetween(
      [
        { hour: 2, minute: 30 },
        { hour: 9, minute: 0 }
      ],
      new Date("2026-03-28T23:00:00.000Z"),
      new Date("2026-03-29T22:00:00.000Z"),
      "Europe/Berlin"
    );
    expect(triggers.map((trigger) => trigger.toISOString())).toEqual([
      "2026-03-29T01:30:00.000Z",
      "2026-03-29T07:00:00.000Z"
    ]);
  });

  it("should fire a repeated hour only once on fall-back day", () => {
    const triggers = listTriggersBetween(
      [
        { hour: 2, minute: 30 },
        { hour: 9, minute: 0 }
      ],
      new Date("2026-10-24T22:00:00.000Z"),
      new Date("2026-10-25T23:00:00.000Z"),
      "Europe/Berlin"
    );
    expect(triggers.map((trigger) => trigger.toISOString())).toEqual([
      "2026-10-25T00:30:00.000Z",
      "2026-10-25T08:00:00.000Z"
    ]);
  });
});

describe("JobScheduler", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("should register only the fetch task on cron in the policy timezone", () => {
    const cron = fakeCron();
    const scheduler = new JobScheduler({
      timing: { ...timing, timezone: "Europe/Berlin" },
      runPublish: async () => undefined,
      runFetch: async () => undefined,
      notifier: new RecordingNotifier(),
      schedule: cron.schedule
    });

    scheduler.start();

    expect(cron.registered.map((entry) => [entry.expression, entry.timezone])).toEqual([
      ["10 0 * * *", "Europe/Berlin"]
    ]);
    expect(scheduler.getStatus().running).toBe(true);

    scheduler.stop();
    expect(cron.registered.every((entry) => entry.stopped)).toBe(true);
    expect(scheduler.getStatus().running).toBe(false);
  });

  it("should run a fetch cycle when the cron task fires", async () => {
    const cron = fakeCron();
    const runFetch = jest.fn(async () => undefined);
    const scheduler = new JobScheduler({
      timing,
      runPublish: async () => undefined,
      runFetch,
      notifier: new RecordingNotifier(),
      schedule: cron.schedule
    });
    scheduler.start();

    cron.registered[0].callback();
    await scheduler.whenIdle();
    scheduler.stop();

    expect(runFetch).toHaveBeenCalledTimes(1);
  });

  it("should publish once per instant across the spring-forward gap", async () => {
    jest.useFakeTimers({ now: new Date("2026-03-28T23:00:00.000Z") });
    const runPublish = jest.fn(async () => undefined);
    const scheduler = new JobScheduler({
      timing: { ...timing, publishTimes: [{ hour: 2, minute: 30 }], timezone: "Europe/Berlin" },
      runPublish,
      runFetch: async () => undefined,
      notifier: new RecordingNotifier(),
      schedule: fakeCron().schedule
    });

    scheduler.start();
    expect(scheduler.getNextPublishAt()).toEqual(new Date("2026-03-29T01:30:00.000Z"));

    await jest.advanceTimersByTimeAsync(6 * 60 * 60 * 1000);
    expect(runPublish).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(runPublish).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await jest.advanceTimersByTimeAsync(48 * 60 * 60 * 1000);
    expect(runPublish).toHaveBeenCalledTimes(2);
  });

  it("should drop a publish tick that lands while another cycle is running", async () => {
    jest.useFakeTimers({ now: new Date("2026-03-01T11:00:00.000Z") });
    const gate = deferred();
    const runFetch = jest.fn(() => gate.promise);
    const runPublish = jest.fn(async () => undefined);
    const scheduler = new JobScheduler({
      timing,
      runPublish,
      runFetch,
      notifier: new RecordingNotifier(),
      schedule: fakeCron().schedule
    });
    scheduler.start();

    expect(scheduler.triggerFetch("http")).toBe("started");
    // 12:00 UTC приходится на ещё идущий fetch
    await jest.advanceTimersByTimeAsync(90 * 60 * 1000);
    expect(runPublish).not.toHaveBeenCalled();

    gate.resolve();
    await scheduler.whenIdle();
    // следующий тик в 18:00 уже выполняется
    await jest.advanceTimersByTimeAsync(6 * 60 * 60 * 1000);
    expect(runPublish).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it("should share one in-flight slot between publish and fetch", async () => {
    const publishGate = deferred();
    const fetchGate = deferred();
    const runPublish = jest.fn(() => publishGate.promise);
    const runFetch = jest.fn(() => fetchGate.promise);
    const scheduler = new JobScheduler({
      timing,
      runPublish,
      runFetch,
      notifier: new RecordingNotifier(),
      schedule: fakeCron().schedule
    });

    expect(scheduler.triggerPublish("http")).toBe("started");
    expect(scheduler.triggerPublish("http")).toBe("dropped");
    expect(scheduler.triggerFetch("cron")).toBe("dropped");
    expect(scheduler.getStatus()).toMatchObject({ publishInFlight: true, fetchInFlight: false });

    publishGate.resolve();
    await scheduler.whenIdle();

    expect(scheduler.triggerFetch("cron")).toBe("started");
    expect(scheduler.triggerPublish("http")).toBe("dropped");
    expect(scheduler.getStatus()).toMatchObject({ publishInFlight: false, fetchInFlight: true });

    fetchGate.resolve();
    await scheduler.whenIdle();

    expect(runPublish).toHaveBeenCalledTimes(1);
    expect(runFetch).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus()).toMatchObject({ publishInFlight: false, fetchInFlight: false });
  });

  it("should run a refill inside the publish slot", async () => {
    const refillGate = deferred();
    const refill = jest.fn(() => refillGate.promise);
    const scheduler: JobScheduler = new JobScheduler({
      timing,
      runPublish: () => scheduler.refillWithinCycle(refill),
      runFetch: async () => undefined,
      notifier: new RecordingNotifier(),
      schedule: fakeCron().schedule
    });

    expect(scheduler.triggerPublish("http")).toBe("started");
    expect(refill).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus()).toMatchObject({ publishInFlight: true, fetchInFlight: true });
    expect(scheduler.triggerFetch("cron")).toBe("dropped");

    refillGate.resolve();
    await scheduler.whenIdle();

    expect(scheduler.getStatus()).toMatchObject({ publishInFlight: false, fetchInFlight: false });
  });

  it("should notify and keep triggering after a cycle crashes", async () => {
    const notifier = new RecordingNotifier();
    const runFetch = jest
      .fn<Promise<unknown>, []>()
      .mockRejectedValueOnce(new Error("state file locked"))
      .mockResolvedValueOnce(undefined);
    const scheduler = new JobScheduler({
      timing,
      runPublish: async () => undefined,
      runFetch,
      notifier,
      schedule: fakeCron().schedule,
      now: () => new Date("2026-03-01T00:10:00.000Z")
    });

    scheduler.triggerFetch("cron");
    await scheduler.whenIdle();

    expect(notifier.events).toEqual([
      {
        type: "FatalPipelineError",
        stage: "fetch",
        message: "state file locked",
        at: new Date("2026-03-01T00:10:00.000Z")
      }
    ]);

    expect(scheduler.triggerFetch("cron")).toBe("started");
    await scheduler.whenIdle();
    expect(runFetch).toHaveBeenCalledTimes(2);
  });

  it("should expose the next publish instant in its status", () => {
    const scheduler = new JobScheduler({
      timing,
      runPublish: async () => undefined,
      runFetch: async () => undefined,
      notifier: new RecordingNotifier(),
      schedule: fakeCron().schedule,
      now: () => new Date("2026-03-01T19:00:00.000Z")
    });

    expect(scheduler.getStatus()).toEqual({
      running: false,
      publishInFlight: false,
      fetchInFlight: false,
      nextPublishAt: new Date("2026-03-01T21:30:00.000Z"),
      timezone: "UTC"
    });
  });
});
