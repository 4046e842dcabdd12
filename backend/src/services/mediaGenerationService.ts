/**
 * Генерация медиа для элемента очереди: одна общая озвучка и по варианту видео на primary-канал.
 * Сам TTS и рендер выполняются внешними командами из generation.audioCommand / videoCommand.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { DateTime } from "luxon";
import type { GenerationSettings, PrimaryChannelConfig, SharedSettings } from "../types/channel";
import type { ArtifactRef, MediaRef, QueueItem } from "../types/pipeline";
import { CommandRunner, runShellCommand, tailLines } from "../utils/commandRunner";
import { startTimer } from "../utils/formatElapsed";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

export const SHARED_AUDIO_FILE = "shared_tts.wav";
export const ITEM_FILE = "item.json";
const GENERATION_TIMEOUT_MS = 30 * 60 * 1000;

export interface MediaGenerator {
  generateSharedAudio(item: QueueItem): Promise<ArtifactRef>;
  generateVideo(item: QueueItem, channel: Readonly<PrimaryChannelConfig>, audio: ArtifactRef): Promise<MediaRef>;
  /** Удаляет файл. Ошибки только логируются. */
  release(ref: MediaRef): Promise<void>;
  /** Удаляет всё, что осталось от элемента после цикла (в том числе после сбоя). */
  cleanupItem(item: QueueItem): Promise<void>;
}

export interface CommandMediaGeneratorOptions {
  generation: GenerationSettings;
  shared: SharedSettings;
  timezone: string;
  publicBaseUrl?: string;
  runCommand?: CommandRunner;
  now?: () => Date;
}

/**
 * Приводит идентификатор к безопасному имени файла/папки
 */
export function toSafeSegment(value: string): string {
  const safe = value.replace(/[^A-Za-z0-9_-]+/g, "_");
  return safe || "_";
}

/**
 * Публичный URL файла из outputRoot, отдаваемого роутом /api/media
 */
export function buildMediaPublicUrl(
  publicBaseUrl: string | undefined,
  outputRoot: string,
  filePath: string
): string | undefined {
  if (!publicBaseUrl) {
    return undefined;
  }
  const relative = path.relative(outputRoot, filePath).split(path.sep).map(encodeURIComponent);
  return `${publicBaseUrl}/api/media/${relative.join("/")}`;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

export class CommandMediaGenerator implements MediaGenerator {
  private readonly runCommand: CommandRunner;
  private readonly now: () => Date;
  // Папка фиксируется при первом обращении: цикл через полночь не делится на два дня
  private readonly itemDirs = new Map<string, string>();

  constructor(private readonly options: CommandMediaGeneratorOptions) {
    this.runCommand = options.runCommand ?? runShellCommand;
    this.now = options.now ?? (() => new Date());
  }

  private getItemDir(item: QueueItem): string {
    const known = this.itemDirs.get(item.id);
    if (known) {
      return known;
    }
    const day = DateTime.fromJSDate(this.now(), { zone: this.options.timezone }).toFormat("yyyy-MM-dd");
    const itemDir = path.join(this.options.shared.outputRoot, day, `item_${toSafeSegment(item.id)}`);
    this.itemDirs.set(item.id, itemDir);
    return itemDir;
  }

  private async prepareItemDir(item: QueueItem): Promise<{ itemDir: string; itemFile: string }> {
    const itemDir = this.getItemDir(item);
    await fs.mkdir(itemDir, { recursive: true });
    const itemFile = path.join(itemDir, ITEM_FILE);
    await fs.writeFile(
      itemFile,
      JSON.stringify({ ...item, createdAt: item.createdAt.toISOString() }, null, 2),
      "utf-8"
    );
    return { itemDir, itemFile };
  }

  private async runStep(
    step: string,
    command: string | undefined,
    outputPath: string,
    env: Record<string, string>
  ): Promise<void> {
    if (!command) {
      throw new Error(`GENERATION_NOT_CONFIGURED: generation.${step}Command is not set`);
    }

    const elapsed = startTimer();
    try {
      await this.produce(step, command, outputPath, env);
    } catch (error) {
      // Недописанный файл не должен остаться в outputRoot
      await fs.rm(outputPath, { force: true });
      throw error;
    }
    Logger.info(`[Generation] ${step} ready`, { outputPath, elapsed: elapsed() });
  }

  private async produce(
    step: string,
    command: string,
    outputPath: string,
    env: Record<string, string>
  ): Promise<void> {
    try {
      const { stderr } = await this.runCommand(command, { ...env, OUTPUT_PATH: outputPath }, {
        timeoutMs: GENERATION_TIMEOUT_MS
      });
      if (stderr.trim()) {
        Logger.debug(`[Generation] ${step} stderr`, { tail: tailLines(stderr) });
      }
    } catch (error) {
      throw new Error(`GENERATION_COMMAND_FAILED: ${step} command failed: ${getErrorMessage(error)}`, {
        cause: error
      });
    }

    if (!(await fileExists(outputPath))) {
      throw new Error(`GENERATION_OUTPUT_MISSING: ${step} command did not produce ${outputPath}`);
    }
  }

  private toMediaRef(id: string, filePath: string): MediaRef {
    return {
      id,
      path: filePath,
      publicUrl: buildMediaPublicUrl(this.options.publicBaseUrl, this.options.shared.outputRoot, filePath)
    };
  }

  async generateSharedAudio(item: QueueItem): Promise<ArtifactRef> {
    const { itemDir, itemFile } = await this.prepareItemDir(item);
    const outputPath = path.join(itemDir, SHARED_AUDIO_FILE);

    await this.runStep("audio", this.options.generation.audioCommand, outputPath, {
      ITEM_FILE: itemFile,
      ITEM_ID: item.id,
      AUDIO_FOLDER: this.options.shared.audioFolder
    });

    return this.toMediaRef(`${item.id}:audio`, outputPath);
  }

  async generateVideo(
    item: QueueItem,
    channel: Readonly<PrimaryChannelConfig>,
    audio: ArtifactRef
  ): Promise<MediaRef> {
    const { itemDir, itemFile } = await this.prepareItemDir(item);
    const outputPath = path.join(itemDir, `${toSafeSegment(channel.id)}.mp4`);

    await this.runStep("video", this.options.generation.videoCommand, outputPath, {
      ITEM_FILE: itemFile,
      ITEM_ID: item.id,
      AUDIO_PATH: audio.path,
      MEDIA_FOLDER: channel.mediaFolderRef,
      CHANNEL_ID: channel.id
    });

    return this.toMediaRef(`${item.id}:${channel.id}`, outputPath);
  }

  async release(ref: MediaRef): Promise<void> {
    try {
      await fs.rm(ref.path, { force: true });
      Logger.debug("[Generation] Removed generated file", { path: ref.path });

      // Папка элемента удаляется, когда в ней остался только item.json
      const itemDir = path.dirname(ref.path);
      const rest = await fs.readdir(itemDir);
      if (rest.every((name) => name === ITEM_FILE)) {
        await fs.rm(itemDir, { recursive: true, force: true });
        Logger.debug("[Generation] Removed item folder", { itemDir });
      }
    } catch (error) {
      Logger.warn("[Generation] Failed to clean up generated file", {
        path: ref.path,
        error: getErrorMessage(error)
      });
    }
  }

  async cleanupItem(item: QueueItem): Promise<void> {
    const itemDir = this.itemDirs.get(item.id);
    if (!itemDir) {
      return;
    }
    this.itemDirs.delete(item.id);
    try {
      await fs.rm(itemDir, { recursive: true, force: true });
      Logger.debug("[Generation] Item folder cleaned up", { itemId: item.id, itemDir });
    } catch (error) {
      Logger.warn("[Generation] Failed to clean up item folder", { itemDir, error: getErrorMessage(error) });
    }
  }
}
