import { open, stat } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import { createAuthorizedClient } from "../auth/googleAuth.js";
import type { Logger } from "../logger.js";
import type { Credential, UploadResult } from "../types.js";
import { audioMimeType } from "../utils/audio.js";

const UPLOAD_ENDPOINT = "https://www.googleapis.com/upload/drive/v3/files";
const CHUNK_GRANULARITY = 256 * 1024;
export const DEFAULT_CHUNK_SIZE = 32 * CHUNK_GRANULARITY;

export interface DriveRequest {
  url: string;
  method: "POST" | "PUT";
  params?: Record<string, string>;
  headers?: Record<string, string>;
  data?: unknown;
  validateStatus?: (status: number) => boolean;
}

export interface DriveResponse {
  status: number;
  headers: Record<string, string | undefined>;
  data: unknown;
}

/** An HTTP client that signs requests with the user's access token. */
export interface DriveRequester {
  request(options: DriveRequest): Promise<DriveResponse>;
}

export function createDriveRequester(credential: Credential): DriveRequester {
  const client = createAuthorizedClient(credential);
  return {
    async request(options) {
      const res = await client.request<unknown>(options);
      return { status: res.status, headers: res.headers, data: res.data };
    },
  };
}

const driveFileSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  webViewLink: z.string().optional(),
});

type DriveFileResource = z.infer<typeof driveFileSchema>;

interface DriveClientOptions {
  logger: Logger;
  chunkSize?: number;
  createRequester?: (credential: Credential) => DriveRequester;
}

export class DriveClient {
  private logger: Logger;
  private chunkSize: number;
  private createRequester: (credential: Credential) => DriveRequester;

  constructor(options: DriveClientOptions) {
    this.logger = options.logger;
    // Drive rejects chunks that are not a multiple of 256 KiB (except the last).
    const requested = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkSize = Math.max(
      CHUNK_GRANULARITY,
      Math.floor(requested / CHUNK_GRANULARITY) * CHUNK_GRANULARITY,
    );
    this.createRequester = options.createRequester ?? createDriveRequester;
  }

  /**
   * Uploads `localPath` with Drive's resumable protocol. The credential must
   * already be valid; nothing here refreshes it. Returns undefined on any
   * failure and does not retry.
   */
  async uploadFile(
    localPath: string,
    credential: Credential,
    folderId?: string,
  ): Promise<UploadResult | undefined> {
    const name = basename(localPath);
    const mimeType = audioMimeType(localPath) ?? "application/octet-stream";
    const requester = this.createRequester(credential);
    const progress: { sessionUri?: string; acknowledged: number } = { acknowledged: 0 };

    try {
      const { size } = await stat(localPath);
      this.logger.info("drive_upload_start", { localPath, name, size, folderId });

      const sessionUri = await this.startSession(requester, { name, mimeType, size, folderId });
      progress.sessionUri = sessionUri;
      const file = await this.sendChunks(
        requester,
        sessionUri,
        { localPath, mimeType, size },
        (offset) => {
          progress.acknowledged = offset;
        },
      );
      this.logger.info("drive_upload_complete", { localPath, fileId: file.id });
      const result: UploadResult = { fileId: file.id, localPath, name: file.name ?? name };
      if (file.webViewLink) result.webViewLink = file.webViewLink;
      return result;
    } catch (error) {
      this.logger.error("drive_upload_failed", {
        localPath,
        folderId,
        sessionUri: progress.sessionUri,
        acknowledgedBytes: progress.acknowledged,
        error,
      });
      return undefined;
    }
  }

  private async startSession(
    requester: DriveRequester,
    file: { name: string; mimeType: string; size: number; folderId?: string },
  ): Promise<string> {
    const metadata: { name: string; mimeType: string; parents?: string[] } = {
      name: file.name,
      mimeType: file.mimeType,
    };
    if (file.folderId) metadata.parents = [file.folderId];

    const res = await requester.request({
      url: UPLOAD_ENDPOINT,
      method: "POST",
      params: {
        uploadType: "resumable",
        fields: "id,name,webViewLink",
        supportsAllDrives: "true",
      },
      headers: {
        "Content-Type": "application/json; charset=UTF-8",
        "X-Upload-Content-Type": file.mimeType,
        "X-Upload-Content-Length": String(file.size),
      },
      data: metadata,
    });

    const location = res.headers.location;
    if (!location) {
      throw new Error("Drive did not return a resumable session URI");
    }
    return location;
  }

  private async sendChunks(
    requester: DriveRequester,
    sessionUri: string,
    { localPath, mimeType, size }: { localPath: string; mimeType: string; size: number },
    onAcknowledged: (offset: number) => void,
  ): Promise<DriveFileResource> {
    const handle = await open(localPath, "r");
    try {
      let offset = 0;
      for (;;) {
        const length = Math.min(this.chunkSize, size - offset);
        const chunk = Buffer.alloc(length);
        const { bytesRead } = await handle.read(chunk, 0, length, offset);
        if (bytesRead !== length) {
          throw new Error(`Short read at offset ${offset}: expected ${length}, got ${bytesRead}`);
        }

        const res = await requester.request({
          url: sessionUri,
          method: "PUT",
          headers: {
            "Content-Type": mimeType,
            "Content-Range": contentRange(offset, length, size),
          },
          data: chunk,
          validateStatus: (status) => status === 200 || status === 201 || status === 308,
        });

        if (res.status !== 308) {
          return driveFileSchema.parse(res.data);
        }

        const next = acknowledgedOffset(res.headers.range);
        if (next <= offset && length > 0) {
          throw new Error(`Drive made no progress at offset ${offset}`);
        }
        offset = next;
        onAcknowledged(offset);
        this.logger.debug("drive_upload_chunk_acknowledged", { localPath, offset, size });
        if (offset >= size) {
          throw new Error("Drive acknowledged every byte but did not finish the upload");
        }
      }
    } finally {
      await handle.close();
    }
  }
}

export function contentRange(offset: number, length: number, size: number): string {
  if (length === 0) return `bytes */${size}`;
  return `bytes ${offset}-${offset + length - 1}/${size}`;
}

/** Parses the `Range: bytes=0-N` header of a 308 reply into the next offset. */
export function acknowledgedOffset(range: string | undefined): number {
  if (!range) return 0;
  const match = /^bytes=0-(\d+)$/.exec(range.trim());
  if (!match) {
    throw new Error(`Unexpected Range header from Drive: ${range}`);
  }
  return Number(match[1]) + 1;
}
