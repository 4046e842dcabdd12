export type RunMode = "continuous" | "fetch-only" | "run-once";

export interface CliOptions {
  configPath: string;
  mode: RunMode;
  /** Игнорировать cooldown fetch только в этом запуске */
  forceFetch: boolean;
}

export const DEFAULT_CONFIG_PATH = "channel_schedule.json";

export const CLI_USAGE = [
  "Usage: storyreel [--config <path>] [--run-once | --fetch-only] [--force-fetch]",
  "",
  "  --config <path>  schedule document (default channel_schedule.json)",
  "  --run-once       one fetch cycle, then one publish cycle, then exit",
  "  --fetch-only     one fetch cycle, then exit",
  "  --force-fetch    ignore the fetch cooldown for this invocation"
].join("\n");

/**
 * Разбирает аргументы командной строки (без node и пути к скрипту).
 * Бросает CLI_ARGS_INVALID для неизвестных флагов.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let configPath = DEFAULT_CONFIG_PATH;
  let runOnce = false;
  let fetchOnly = false;
  let forceFetch = false;

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];

    if (arg === "--config") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("CLI_ARGS_INVALID: --config requires a path");
      }
      configPath = value;
      index++;
    } else if (arg.startsWith("--config=")) {
      configPath = arg.slice("--config=".length);
      if (!configPath) {
        throw new Error("CLI_ARGS_INVALID: --config requires a path");
      }
    } else if (arg === "--run-once") {
      runOnce = true;
    } else if (arg === "--fetch-only") {
      fetchOnly = true;
    } else if (arg === "--force-fetch") {
      forceFetch = true;
    } else {
      throw new Error(`CLI_ARGS_INVALID: unknown argument "${arg}"`);
    }
  }

  // --fetch-only важнее --run-once
  const mode: RunMode = fetchOnly ? "fetch-only" : runOnce ? "run-once" : "continuous";
  return { configPath, mode, forceFetch };
}
