import "dotenv/config";
import { loadEnvSettings } from "./config/env";
import { loadScheduleConfig } from "./config/scheduleConfig";
import { createNotificationTransport, createRuntime, runContinuous, runOneShot } from "./runtime";
import { FatalStage, NotificationBridge } from "./services/notificationBridge";
import { CLI_USAGE, CliOptions, parseCliArgs } from "./utils/cliArgs";
import { Logger } from "./utils/logger";
import { ConfigInvalidError, getErrorMessage, getErrorStack } from "./utils/pipelineErrors";

process.on("unhandledRejection", (reason: unknown) => {
  Logger.error("Unhandled promise rejection", { error: getErrorMessage(reason), stack: getErrorStack(reason) });
});

async function main(): Promise<number | null> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    Logger.error(getErrorMessage(error));
    console.error(CLI_USAGE);
    return 2;
  }

  const env = loadEnvSettings();
  Logger.info("[Startup] StoryReel scheduler starting", {
    mode: cli.mode,
    config: cli.configPath,
    forceFetch: cli.forceFetch,
    storage: env.storageDriver
  });

  const startupNotifier = new NotificationBridge(
    createNotificationTransport(env),
    env.notifyChatIds,
    env.notifySubjectPrefix
  );

  let stage: FatalStage = "startup";
  try {
    const config = await loadScheduleConfig(cli.configPath);
    const runtime = createRuntime(config, env);
    stage = "publish";

    if (cli.mode !== "continuous") {
      return await runOneShot(runtime, cli);
    }

    const shutdown = await runContinuous(runtime, cli);
    const onSignal = (signal: NodeJS.Signals) => {
      Logger.info(`[Startup] Received ${signal}`);
      shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          Logger.error("[Startup] Shutdown failed", { error: getErrorMessage(error) });
          process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    return null;
  } catch (error) {
    const message = getErrorMessage(error);
    if (error instanceof ConfigInvalidError) {
      Logger.error("[Startup] Invalid configuration", { issues: error.issues });
    } else {
      Logger.error("[Startup] Fatal error", { error: message, stack: getErrorStack(error) });
    }
    startupNotifier.notify({ type: "FatalPipelineError", stage, message, at: new Date() });
    await startupNotifier.flush();
    return 1;
  }
}

main()
  .then((exitCode) => {
    if (exitCode !== null) {
      process.exit(exitCode);
    }
  })
  .catch((error: unknown) => {
    Logger.error("[Startup] Unexpected failure", { error: getErrorMessage(error) });
    process.exit(1);
  });
