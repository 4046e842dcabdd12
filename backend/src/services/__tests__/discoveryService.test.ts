import { CommandDiscoveryService, parseDiscoverySummary } from "../discoveryService";

describe("parseDiscoverySummary", () => {
  it("should read the count from the last non-empty line", () => {
    expect(parseDiscoverySummary('scanning...\nfound 3 stories\n{"count": 3}\n\n')).toBe(3);
  });

  it("should return null when the last line is not a summary", () => {
    expect(parseDiscoverySummary("")).toBeNull();
    expect(parseDiscoverySummary('{"count": 3}\ndone')).toBeNull();
    expect(parseDiscoverySummary('{"count": -1}')).toBeNull();
  });
});

describe("CommandDiscoveryService", () => {
  it("should run the command with the queue file and return the count", async () => {
    const runCommand = jest.fn().mockResolvedValue({ stdout: '{"count": 4}', stderr: "" });
    const service = new CommandDiscoveryService({ command: "discover", queueFile: "/data/queue.json", runCommand });

    await expect(service.fetchAndQueueItems()).resolves.toEqual({ ok: true, count: 4 });
    expect(runCommand).toHaveBeenCalledWith("discover", { QUEUE_FILE: "/data/queue.json" }, { timeoutMs: 900000 });
  });

  it("should treat a missing summary as zero new items", async () => {
    const runCommand = jest.fn().mockResolvedValue({ stdout: "nothing new", stderr: "" });
    const service = new CommandDiscoveryService({ command: "discover", queueFile: "q.json", runCommand });

    await expect(service.fetchAndQueueItems()).resolves.toEqual({ ok: true, count: 0 });
  });

  it("should report a failing command", async () => {
    const runCommand = jest.fn().mockRejectedValue(new Error("Command failed: discover"));
    const service = new CommandDiscoveryService({ command: "discover", queueFile: "q.json", runCommand });

    await expect(service.fetchAndQueueItems()).resolves.toEqual({ ok: false, error: "Command failed: discover" });
  });

  it("should report a missing command without running anything", async () => {
    const runCommand = jest.fn();
    const service = new CommandDiscoveryService({ queueFile: "q.json", runCommand });

    await expect(service.fetchAndQueueItems()).resolves.toEqual({
      ok: false,
      error: "discovery.command is not configured"
    });
    expect(runCommand).not.toHaveBeenCalled();
  });
});
