import { loadClientSecrets } from "./auth/clientSecrets.js";
import { LoopbackConsentFlow } from "./auth/consentFlow.js";
import { CredentialStore } from "./auth/credentialStore.js";
import { GoogleTokenRefresher } from "./auth/googleAuth.js";
import { OAuthAuthorizer } from "./auth/oauthAuthorizer.js";
import { DriveClient } from "./clients/drive.js";
import { GeminiClient } from "./clients/gemini.js";
import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { ProcessingService } from "./services/processing.js";
import { resolveGeminiApiKey } from "./utils/secretManager.js";

export interface Application {
  config: AppConfig;
  logger: Logger;
  authorizer: OAuthAuthorizer;
  processing: ProcessingService;
}

export interface CreateApplicationOptions {
  /** How the consent URL reaches the user; the log by default. */
  onAuthUrl?: (url: string) => void;
}

/** Only what Drive authorization needs; no Gemini key is involved. */
export function createAuthorizer(
  config: AppConfig,
  logger: Logger,
  options: CreateApplicationOptions = {},
): OAuthAuthorizer {
  return new OAuthAuthorizer({
    store: new CredentialStore({ path: config.driveCredentialsPath, logger }),
    loadSecrets: () => loadClientSecrets(config.oauthClientSecretPath),
    refresher: new GoogleTokenRefresher(),
    consent: new LoopbackConsentFlow({
      port: config.oauthCallbackPort,
      logger,
      onAuthUrl: options.onAuthUrl,
    }),
    logger,
    refreshThresholdMs: config.tokenRefreshThresholdMs,
  });
}

/** Builds the component graph once per process; nothing here is module-level state. */
export async function createApplication(
  config: AppConfig,
  logger: Logger,
  options: CreateApplicationOptions = {},
): Promise<Application> {
  const apiKey = await resolveGeminiApiKey(config, logger);
  const authorizer = createAuthorizer(config, logger, options);

  const processing = new ProcessingService({
    authorizer,
    driveClient: new DriveClient({ logger }),
    geminiClient: new GeminiClient({ modelName: config.geminiModel, apiKey, logger }),
    logger,
    quizQuestionCount: config.quizQuestionCount,
    defaultFolderId: config.googleDriveFolderId,
  });

  return { config, logger, authorizer, processing };
}
