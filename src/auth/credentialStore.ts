import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import { PersistenceError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Credential } from "../types.js";

/**
 * On-disk token layout. Same field names as google-auth-library's
 * `Credentials`, so a token file written here can be handed to an
 * `OAuth2Client` directly.
 */
const storedTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expiry_date: z.number().finite().optional(),
  scope: z.string().default(""),
  token_type: z.string().optional(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

export function toStoredToken(credential: Credential): StoredToken {
  return {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiresAt,
    scope: credential.scopes.join(" "),
    token_type: "Bearer",
  };
}

export function fromStoredToken(token: StoredToken): Credential {
  const credential: Credential = {
    accessToken: token.access_token,
    scopes: token.scope.split(" ").filter((scope) => scope !== ""),
  };
  if (token.refresh_token !== undefined) credential.refreshToken = token.refresh_token;
  if (token.expiry_date !== undefined) credential.expiresAt = token.expiry_date;
  return credential;
}

export interface CredentialStoreOptions {
  path: string;
  logger: Logger;
}

export class CredentialStore {
  readonly path: string;
  private logger: Logger;

  constructor(options: CredentialStoreOptions) {
    this.path = options.path;
    this.logger = options.logger;
  }

  /** Returns undefined when there is no usable token file; never throws. */
  async load(): Promise<Credential | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug("credential_store_missing", { path: this.path });
        return undefined;
      }
      this.logger.warn("credential_store_read_failed", {
        path: this.path,
        error: new PersistenceError(`Cannot read ${this.path}`, { cause: error }),
      });
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("credential_store_invalid_json", {
        path: this.path,
        error: new PersistenceError(`Token file ${this.path} is not valid JSON`, { cause: error }),
      });
      return undefined;
    }

    const parsed = storedTokenSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("credential_store_invalid_token", {
        path: this.path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return undefined;
    }
    return fromStoredToken(parsed.data);
  }

  /**
   * Writes to a sibling temp file and renames it over the token file, so a
   * crash mid-write leaves the previous token in place.
   */
  async save(credential: Credential): Promise<boolean> {
    const directory = dirname(this.path);
    const tempPath = join(
      directory,
      `.${basename(this.path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
    );
    try {
      await mkdir(directory, { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(toStoredToken(credential), null, 2)}\n`, {
        encoding: "utf-8",
        mode: 0o600,
      });
      await rename(tempPath, this.path);
      this.logger.debug("credential_store_saved", { path: this.path });
      return true;
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug("credential_store_temp_cleanup_failed", {
          path: tempPath,
          error: cleanupError,
        });
      });
      this.logger.error("credential_store_write_failed", {
        path: this.path,
        error: new PersistenceError(`Cannot write ${this.path}`, { cause: error }),
      });
      return false;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
