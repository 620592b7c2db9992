import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import type { AppConfig } from "../config.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

/**
 * Access a Secret Manager version and return the decoded payload (utf8 string).
 * Expects a full resource name like:
 *   projects/{project}/secrets/{secret}/versions/{version}
 */
export async function accessSecretPayload(name: string): Promise<string> {
  const client = new SecretManagerServiceClient();
  const [version] = await client.accessSecretVersion({ name });
  const data = version.payload?.data?.toString();
  if (!data) {
    throw new Error(`Secret payload not found for ${name}`);
  }
  return data;
}

/** The configured key wins; otherwise the key is read from Secret Manager. */
export async function resolveGeminiApiKey(
  config: Pick<AppConfig, "geminiApiKey" | "googleGenerativeAiApiKeySecret">,
  logger: Logger,
  accessSecret: (name: string) => Promise<string> = accessSecretPayload,
): Promise<string> {
  if (config.geminiApiKey) return config.geminiApiKey;
  if (!config.googleGenerativeAiApiKeySecret) {
    throw new ConfigurationError(
      "GOOGLE_GENERATIVE_AI_API_KEY is not set and GOOGLE_GENERATIVE_AI_API_KEY_SECRET is not configured",
    );
  }

  let apiKey: string;
  try {
    apiKey = (await accessSecret(config.googleGenerativeAiApiKeySecret)).trim();
  } catch (error) {
    throw new ConfigurationError(`Cannot read Gemini API key secret: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (!apiKey) {
    throw new ConfigurationError("Gemini API key secret is empty");
  }
  logger.info("gemini_api_key_loaded_from_secret", {
    secret: config.googleGenerativeAiApiKeySecret,
  });
  return apiKey;
}
