import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      geminiModel: "gemini-2.5-flash",
      driveCredentialsPath: ".credentials/drive-token.json",
      oauthClientSecretPath: "client_secret.json",
      oauthCallbackPort: 8085,
      inputAudioDir: "input_audio",
      quizQuestionCount: 5,
      tokenRefreshThresholdMs: 300000,
      logLevel: "info",
    });
  });

  it("reads values from the environment and treats blanks as unset", () => {
    const config = loadConfig({
      PORT: "3000",
      GEMINI_API_KEY: "test-key",
      GOOGLE_DRIVE_FOLDER_ID: "folder-123",
      QUIZ_QUESTION_COUNT: "10",
      GEMINI_MODEL: "   ",
      LOG_LEVEL: "debug",
    });

    expect(config).toMatchObject({
      port: 3000,
      geminiApiKey: "test-key",
      googleDriveFolderId: "folder-123",
      quizQuestionCount: 10,
      geminiModel: "gemini-2.5-flash",
      logLevel: "debug",
    });
  });

  it("prefers GOOGLE_GENERATIVE_AI_API_KEY over GEMINI_API_KEY", () => {
    const config = loadConfig({ GOOGLE_GENERATIVE_AI_API_KEY: "test-key-a", GEMINI_API_KEY: "test-key-b" });
    expect(config.geminiApiKey).toBe("test-key-a");
  });

  it("falls back to GEMINI_API_KEY when the primary key is blank", () => {
    expect(loadConfig({ GOOGLE_GENERATIVE_AI_API_KEY: "", GEMINI_API_KEY: "test-key" }).geminiApiKey).toBe(
      "test-key",
    );
    expect(
      loadConfig({ GOOGLE_GENERATIVE_AI_API_KEY: "  ", GEMINI_API_KEY: "test-key" }).geminiApiKey,
    ).toBe("test-key");
  });

  it("lists every invalid setting in a ConfigurationError", () => {
    expect(() => loadConfig({ PORT: "abc", LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: "abc", LOG_LEVEL: "loud" })).toThrow(/port: .*logLevel: /);
  });
});
