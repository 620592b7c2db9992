import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

// The Cloud console downloads desktop clients under "installed" and web clients under "web".
const clientSecretsFileSchema = z.union([
  z.object({ installed: clientEntrySchema }).transform((file) => file.installed),
  z.object({ web: clientEntrySchema }).transform((file) => file.web),
]);

export interface OAuthClientSecrets {
  clientId: string;
  clientSecret: string;
}

export async function loadClientSecrets(path: string): Promise<OAuthClientSecrets> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`OAuth client secret file not found or unreadable: ${path}`, {
      cause: error,
    });
  }
  return parseClientSecrets(raw, path);
}

export function parseClientSecrets(raw: string, source = "client secrets"): OAuthClientSecrets {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${source} is not valid JSON`, { cause: error });
  }

  const parsed = clientSecretsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `${source} must contain an "installed" or "web" entry with client_id and client_secret`,
    );
  }

  const entry = parsed.data;
  return { clientId: entry.client_id, clientSecret: entry.client_secret };
}
