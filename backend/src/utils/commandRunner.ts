import { exec } from "child_process";
import { promisify } from "util";

const execAsync = promisify(exec);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Запуск внешней команды с дополнительными переменными окружения.
 * Ненулевой код выхода - исключение (как у exec).
 */
export type CommandRunner = (
  command: string,
  env: Record<string, string>,
  options?: { timeoutMs?: number }
) => Promise<CommandOutput>;

export const runShellCommand: CommandRunner = async (command, env, options) => {
  const { stdout, stderr } = await execAsync(command, {
    env: { ...process.env, ...env },
    maxBuffer: 10 * 1024 * 1024,
    timeout: options?.timeoutMs ?? 0
  });
  return { stdout, stderr };
};

/**
 * Последние строки stderr для логов (команды рендера пишут туда много прогресса).
 */
export function tailLines(text: string, count = 5): string {
  return text.trim().split(/\r?\n/).slice(-count).join("\n");
}
