import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { Hono } from "hono";
import type { Logger } from "./logger.js";
import type { ProcessingService } from "./services/processing.js";
import type { StudyResult } from "./types.js";

export interface HttpAppDeps {
  processing: Pick<ProcessingService, "processAudio">;
  logger: Logger;
  workDir?: string;
}

function parseFlag(value: unknown): boolean | undefined {
  if (typeof value !== "string") return undefined;
  if (value === "true" || value === "on" || value === "1") return true;
  if (value === "false" || value === "off" || value === "0") return false;
  return undefined;
}

/** The upload's own base name, or "audio" when that would not name a file. */
export function uploadFileName(name: string): string {
  const base = basename(name);
  return base === "" || base === "." || base === ".." ? "audio" : base;
}

function toResponseBody(fileName: string, result: StudyResult) {
  return {
    fileName,
    notes: result.notes,
    quiz: result.quiz,
    upload: result.upload
      ? {
          fileId: result.upload.fileId,
          name: result.upload.name,
          webViewLink: result.upload.webViewLink,
        }
      : undefined,
    failures: result.failures,
  };
}

export function createHttpApp({ processing, logger, workDir = tmpdir() }: HttpAppDeps): Hono {
  const app = new Hono();

  app.get("/healthz", (c) => {
    return c.json({ ok: true });
  });

  app.post("/process", async (c) => {
    const body = await c.req.parseBody().catch((error: unknown) => {
      logger.warn("http_process_invalid_body", { error });
      return undefined;
    });
    if (!body) return c.json({ error: "Expected a multipart form body" }, 400);

    const audio = body.audio;
    if (!audio || typeof audio === "string") {
      return c.json({ error: "audio file is required" }, 400);
    }
    const folderId = typeof body.folderId === "string" && body.folderId ? body.folderId : undefined;
    const uploadToDrive = parseFlag(body.uploadToDrive);
    const fileName = uploadFileName(audio.name);

    logger.info("http_process_requested", { fileName, size: audio.size, folderId, uploadToDrive });

    const directory = await mkdtemp(join(workDir, "lecture-audio-"));
    try {
      const localPath = join(directory, fileName);
      await writeFile(localPath, Buffer.from(await audio.arrayBuffer()));
      const result = await processing.processAudio({ localPath, folderId, uploadToDrive });

      const responseBody = toResponseBody(fileName, result);
      if (result.notes === undefined && result.quiz === undefined) {
        return c.json({ error: "Failed to process audio", ...responseBody }, 502);
      }
      return c.json(responseBody);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  return app;
}
