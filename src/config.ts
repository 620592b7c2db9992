import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(8080),
  geminiApiKey: z.string().min(1).optional(),
  googleGenerativeAiApiKeySecret: z.string().min(1).optional(),
  geminiModel: z.string().default("gemini-2.5-flash"),
  googleDriveFolderId: z.string().min(1).optional(),
  driveCredentialsPath: z.string().min(1).default(".credentials/drive-token.json"),
  oauthClientSecretPath: z.string().min(1).default("client_secret.json"),
  oauthCallbackPort: z.coerce.number().int().min(1).max(65535).default(8085),
  inputAudioDir: z.string().min(1).default("input_audio"),
  quizQuestionCount: z.coerce.number().int().positive().default(5),
  tokenRefreshThresholdMs: z.coerce.number().int().min(0).default(5 * 60 * 1000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AppConfig = z.infer<typeof configSchema>;

// Empty strings in .env files mean "unset".
function presentOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    port: presentOrUndefined(env.PORT),
    geminiApiKey:
      presentOrUndefined(env.GOOGLE_GENERATIVE_AI_API_KEY) ?? presentOrUndefined(env.GEMINI_API_KEY),
    googleGenerativeAiApiKeySecret: presentOrUndefined(env.GOOGLE_GENERATIVE_AI_API_KEY_SECRET),
    geminiModel: presentOrUndefined(env.GEMINI_MODEL),
    googleDriveFolderId: presentOrUndefined(env.GOOGLE_DRIVE_FOLDER_ID),
    driveCredentialsPath: presentOrUndefined(env.GOOGLE_DRIVE_CREDENTIALS_PATH),
    oauthClientSecretPath: presentOrUndefined(env.GOOGLE_OAUTH_CLIENT_SECRET_PATH),
    oauthCallbackPort: presentOrUndefined(env.OAUTH_CALLBACK_PORT),
    inputAudioDir: presentOrUndefined(env.INPUT_AUDIO_DIR),
    quizQuestionCount: presentOrUndefined(env.QUIZ_QUESTION_COUNT),
    tokenRefreshThresholdMs: presentOrUndefined(env.TOKEN_REFRESH_THRESHOLD_MS),
    logLevel: presentOrUndefined(env.LOG_LEVEL),
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }

  return parsed.data;
}
