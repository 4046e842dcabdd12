import { z } from "zod";
import { CommandRunner, runShellCommand, tailLines } from "../utils/commandRunner";
import { startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

export type DiscoveryResult = { ok: true; count: number } | { ok: false; error: string };

export interface DiscoveryService {
  /** Находит новые истории и добавляет их в очередь */
  fetchAndQueueItems(): Promise<DiscoveryResult>;
}

const discoverySummarySchema = z.object({ count: z.number().int().nonnegative() });

const DISCOVERY_TIMEOUT_MS = 15 * 60 * 1000;

/**
 * Количество добавленных элементов из последней непустой строки stdout: {"count": n}
 */
export function parseDiscoverySummary(stdout: string): number | null {
  const lastLine = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .pop();
  if (!lastLine) {
    return null;
  }
  try {
    const parsed = discoverySummarySchema.safeParse(JSON.parse(lastLine));
    return parsed.success ? parsed.data.count : null;
  } catch {
    return null;
  }
}

export interface CommandDiscoveryServiceOptions {
  command?: string;
  queueFile: string;
  runCommand?: CommandRunner;
}

export class CommandDiscoveryService implements DiscoveryService {
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: CommandDiscoveryServiceOptions) {
    this.runCommand = options.runCommand ?? runShellCommand;
  }

  async fetchAndQueueItems(): Promise<DiscoveryResult> {
    const { command, queueFile } = this.options;
    if (!command) {
      return { ok: false, error: "discovery.command is not configured" };
    }

    const elapsed = startTimer();
    Logger.info("[Discovery] Running discovery command", { queueFile });

    try {
      const { stdout, stderr } = await this.runCommand(command, { QUEUE_FILE: queueFile }, {
        timeoutMs: DISCOVERY_TIMEOUT_MS
      });
      if (stderr.trim()) {
        Logger.debug("[Discovery] stderr", { tail: tailLines(stderr) });
      }

      const count = parseDiscoverySummary(stdout);
      if (count === null) {
        Logger.warn("[Discovery] Command did not report a count, assuming 0");
      }

      Logger.info("[Discovery] Completed", { count: count ?? 0, elapsed: elapsed() });
      return { ok: true, count: count ?? 0 };
    } catch (error) {
      const message = getErrorMessage(error);
      Logger.error("[Discovery] Command failed", { error: message, elapsed: elapsed() });
      return { ok: false, error: message };
    }
  }
}
