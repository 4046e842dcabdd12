import { Router } from "express";
import * as path from "path";
import * as fs from "fs/promises";
import { createReadStream, Stats } from "fs";
import { Logger } from "../utils/logger";
import { getErrorMessage } from "../utils/pipelineErrors";

// Media routes для отдачи сгенерированных файлов (Blotato скачивает видео по публичному URL)

const MIME_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg"
};

function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes("..") && !segment.includes("/") && !segment.includes("\\");
}

/**
 * Разбирает заголовок Range ("bytes=0-99", "bytes=100-"). null - диапазон не удовлетворим.
 */
export function parseRangeHeader(range: string, size: number): { start: number; end: number } | null {
  const match = /^bytes=(\d*)-(\d*)$/.exec(range.trim());
  if (!match || (!match[1] && !match[2])) {
    return null;
  }
  let start: number;
  let end: number;
  if (!match[1]) {
    // bytes=-N: последние N байт
    start = Math.max(0, size - Number(match[2]));
    end = size - 1;
  } else {
    start = Number(match[1]);
    end = match[2] ? Math.min(Number(match[2]), size - 1) : size - 1;
  }
  if (start > end || start >= size) {
    return null;
  }
  return { start, end };
}

/**
 * GET /api/media/:day/:itemFolder/:fileName
 * Отдаёт файлы только из outputRoot. Поддерживает Range-запросы.
 */
export function createMediaRoutes(outputRoot: string): Router {
  const router = Router();
  const resolvedRoot = path.resolve(outputRoot);

  router.get("/:day/:itemFolder/:fileName", async (req, res) => {
    const { day, itemFolder, fileName } = req.params;

    if (![day, itemFolder, fileName].every(isSafeSegment)) {
      Logger.warn("[MediaRoutes] Path traversal attempt", { day, itemFolder, fileName });
      return res.status(400).json({ error: "Invalid path" });
    }

    const filePath = path.resolve(resolvedRoot, day, itemFolder, fileName);
    if (!filePath.startsWith(resolvedRoot + path.sep)) {
      return res.status(403).json({ error: "Access denied" });
    }

    // Только медиафайлы: item.json и прочие служебные файлы наружу не отдаются
    const contentType: string | undefined = MIME_TYPES[path.extname(fileName).toLowerCase()];
    if (!contentType) {
      return res.status(404).json({ error: "File not found" });
    }

    const pipeFile = (range?: { start: number; end: number }) => {
      const stream = createReadStream(filePath, range);
      stream.on("error", (error) => {
        Logger.error("[MediaRoutes] Read stream failed", { day, itemFolder, fileName, error: error.message });
        res.destroy(error);
      });
      stream.pipe(res);
    };

    try {
      let stats: Stats;
      try {
        stats = await fs.stat(filePath);
      } catch {
        return res.status(404).json({ error: "File not found" });
      }
      if (!stats.isFile()) {
        return res.status(404).json({ error: "Not a file" });
      }

      const range = req.headers.range;

      if (range) {
        const parsed = parseRangeHeader(range, stats.size);
        if (!parsed) {
          res.setHeader("Content-Range", `bytes */${stats.size}`);
          return res.status(416).end();
        }
        res.writeHead(206, {
          "Content-Range": `bytes ${parsed.start}-${parsed.end}/${stats.size}`,
          "Accept-Ranges": "bytes",
          "Content-Length": parsed.end - parsed.start + 1,
          "Content-Type": contentType
        });
        pipeFile(parsed);
        return;
      }

      res.setHeader("Content-Type", contentType);
      res.setHeader("Content-Length", stats.size);
      res.setHeader("Accept-Ranges", "bytes");
      pipeFile();
      Logger.info("[MediaRoutes] File served", { day, itemFolder, fileName, size: stats.size });
    } catch (error) {
      Logger.error("[MediaRoutes] Error serving file", { day, itemFolder, fileName, error: getErrorMessage(error) });
      if (!res.headersSent) {
        return res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  return router;
}
