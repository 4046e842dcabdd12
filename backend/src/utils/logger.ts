type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

function formatPrefix(level: LogLevel): string {
  return `${new Date().toISOString()} ${level}`;
}

function isDebugEnabled(): boolean {
  return (process.env.LOG_LEVEL || "").toLowerCase() === "debug";
}

export class Logger {
  static debug(message: string, ...meta: unknown[]) {
    if (!isDebugEnabled()) {
      return;
    }
    console.log(`${formatPrefix("DEBUG")} ${message}`, ...meta);
  }

  static info(message: string, ...meta: unknown[]) {
    console.log(`${formatPrefix("INFO")} ${message}`, ...meta);
  }

  static warn(message: string, ...meta: unknown[]) {
    console.warn(`${formatPrefix("WARN")} ${message}`, ...meta);
  }

  static error(message: string, ...meta: unknown[]) {
    console.error(`${formatPrefix("ERROR")} ${message}`, ...meta);
  }
}
