import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { buildMediaPublicUrl, CommandMediaGenerator, toSafeSegment } from "../mediaGenerationService";
import { makeItem, makePrimary } from "../../__tests__/helpers/fakes";
import type { CommandRunner } from "../../utils/commandRunner";

describe("toSafeSegment", () => {
  it("should replace unsafe characters with underscores", () => {
    expect(toSafeSegment("story/42!")).toBe("story_42_");
    expect(toSafeSegment("yt-main_1")).toBe("yt-main_1");
    expect(toSafeSegment("")).toBe("_");
  });
});

describe("buildMediaPublicUrl", () => {
  it("should map a file under outputRoot to the media route", () => {
    expect(
      buildMediaPublicUrl("https://media.example.test", "/data/out", "/data/out/2026-03-02/item_a/yt main.mp4")
    ).toBe("https://media.example.test/api/media/2026-03-02/item_a/yt%20main.mp4");
  });

  it("should return undefined without a public base URL", () => {
    expect(buildMediaPublicUrl(undefined, "/data/out", "/data/out/x.mp4")).toBeUndefined();
  });
});

describe("CommandMediaGenerator", () => {
  let outputRoot: string;
  let calls: Array<{ command: string; env: Record<string, string> }>;

  const writingRunner: CommandRunner = async (command, env) => {
    calls.push({ command, env });
    fs.writeFileSync(env.OUTPUT_PATH, "data");
    return { stdout: "", stderr: "" };
  };

  beforeEach(() => {
    outputRoot = fs.mkdtempSync(path.join(os.tmpdir(), "media-gen-"));
    calls = [];
  });

  afterEach(() => {
    fs.rmSync(outputRoot, { recursive: true, force: true });
  });

  function createGenerator(
    runCommand: CommandRunner,
    audioCommand: string | undefined = "tts",
    now: () => Date = () => new Date("2026-03-01T23:30:00.000Z")
  ) {
    return new CommandMediaGenerator({
      generation: { audioCommand, videoCommand: "render" },
      shared: { outputRoot, audioFolder: "/voices" },
      timezone: "Europe/Berlin",
      publicBaseUrl: "https://media.example.test",
      runCommand,
      now
    });
  }

  it("should generate audio and videos in the item folder of the local day", async () => {
    const generator = createGenerator(writingRunner);
    const item = makeItem("story/42!");
    const itemDir = path.join(outputRoot, "2026-03-02", "item_story_42_");

    const audio = await generator.generateSharedAudio(item);
    const video = await generator.generateVideo(item, makePrimary("yt main", { mediaFolderRef: "/bg" }), audio);

    expect(audio).toEqual({
      id: "story/42!:audio",
      path: path.join(itemDir, "shared_tts.wav"),
      publicUrl: "https://media.example.test/api/media/2026-03-02/item_story_42_/shared_tts.wav"
    });
    expect(video).toEqual({
      id: "story/42!:yt main",
      path: path.join(itemDir, "yt_main.mp4"),
      publicUrl: "https://media.example.test/api/media/2026-03-02/item_story_42_/yt_main.mp4"
    });
    expect(calls[0]).toEqual({
      command: "tts",
      env: {
        ITEM_FILE: path.join(itemDir, "item.json"),
        ITEM_ID: "story/42!",
        AUDIO_FOLDER: "/voices",
        OUTPUT_PATH: audio.path
      }
    });
    expect(calls[1]).toEqual({
      command: "render",
      env: {
        ITEM_FILE: path.join(itemDir, "item.json"),
        ITEM_ID: "story/42!",
        AUDIO_PATH: audio.path,
        MEDIA_FOLDER: "/bg",
        CHANNEL_ID: "yt main",
        OUTPUT_PATH: video.path
      }
    });

    const written = JSON.parse(fs.readFileSync(path.join(itemDir, "item.json"), "utf-8"));
    expect(written).toMatchObject({ id: "story/42!", title: "Story story/42!", createdAt: "2026-01-01T00:00:00.000Z" });
  });

  it("should remove the item folder once the last generated file is released", async () => {
    const generator = createGenerator(writingRunner);
    const item = makeItem("a");
    const audio = await generator.generateSharedAudio(item);
    const video = await generator.generateVideo(item, makePrimary("yt"), audio);
    const itemDir = path.dirname(audio.path);

    await generator.release(video);
    expect(fs.existsSync(video.path)).toBe(false);
    expect(fs.existsSync(itemDir)).toBe(true);

    await generator.release(audio);
    expect(fs.existsSync(itemDir)).toBe(false);
  });

  it("should not throw when releasing an already removed file", async () => {
    const generator = createGenerator(writingRunner);

    await expect(
      generator.release({ id: "x", path: path.join(outputRoot, "missing", "x.mp4") })
    ).resolves.toBeUndefined();
  });

  it("should fail when the command produces no output file", async () => {
    const generator = createGenerator(async () => ({ stdout: "", stderr: "" }));

    await expect(generator.generateSharedAudio(makeItem("a"))).rejects.toThrow(/^GENERATION_OUTPUT_MISSING: audio/);
  });

  it("should wrap command failures", async () => {
    const generator = createGenerator(async () => {
      throw new Error("exit code 1");
    });

    await expect(generator.generateSharedAudio(makeItem("a"))).rejects.toThrow(
      "GENERATION_COMMAND_FAILED: audio command failed: exit code 1"
    );
  });

  it("should fail when the command is not configured", async () => {
    const generator = createGenerator(writingRunner, undefined);

    await expect(generator.generateSharedAudio(makeItem("a"))).rejects.toThrow(
      "GENERATION_NOT_CONFIGURED: generation.audioCommand is not set"
    );
    expect(calls).toHaveLength(0);
  });

  it("should remove a partially written file when the command fails", async () => {
    const generator = createGenerator(async (_command, env) => {
      fs.writeFileSync(env.OUTPUT_PATH, "half");
      throw new Error("killed");
    });
    const itemDir = path.join(outputRoot, "2026-03-02", "item_a");

    await expect(generator.generateSharedAudio(makeItem("a"))).rejects.toThrow(/^GENERATION_COMMAND_FAILED/);

    expect(fs.readdirSync(itemDir)).toEqual(["item.json"]);
  });

  it("should remove the item folder on cleanup after a failed generation", async () => {
    const generator = createGenerator(async () => ({ stdout: "", stderr: "" }));
    const item = makeItem("a");
    const itemDir = path.join(outputRoot, "2026-03-02", "item_a");

    await expect(generator.generateSharedAudio(item)).rejects.toThrow(/^GENERATION_OUTPUT_MISSING/);
    expect(fs.existsSync(itemDir)).toBe(true);

    await generator.cleanupItem(item);
    expect(fs.existsSync(itemDir)).toBe(false);
  });

  it("should keep one item folder when generation crosses midnight", async () => {
    let now = new Date("2026-03-02T22:59:00.000Z");
    const generator = createGenerator(writingRunner, "tts", () => now);
    const item = makeItem("a");

    const audio = await generator.generateSharedAudio(item);
    now = new Date("2026-03-02T23:01:00.000Z");
    const video = await generator.generateVideo(item, makePrimary("yt"), audio);

    expect(path.dirname(video.path)).toBe(path.join(outputRoot, "2026-03-02", "item_a"));
    expect(path.dirname(audio.path)).toBe(path.dirname(video.path));
  });
});
