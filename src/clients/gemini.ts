import { basename } from "node:path";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { FileState, GoogleGenAI } from "@google/genai";
import { generateText } from "ai";
import { ConfigurationError, GenerationError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { StagedAudio } from "../types.js";
import { audioMimeType } from "../utils/audio.js";

/** What the Gemini Files API reports about an uploaded file. */
export interface RemoteFile {
  name?: string;
  uri?: string;
  mimeType?: string;
  state?: string;
}

export interface StagingFiles {
  upload(params: {
    file: string;
    config: { mimeType: string; displayName: string };
  }): Promise<RemoteFile>;
  get(params: { name: string }): Promise<RemoteFile>;
}

export type TextGenerator = (request: {
  modelName: string;
  staged: StagedAudio;
  instruction: string;
}) => Promise<string>;

export function createStagingFiles(apiKey: string): StagingFiles {
  const ai = new GoogleGenAI({ apiKey });
  return {
    upload: (params) => ai.files.upload(params),
    get: (params) => ai.files.get(params),
  };
}

export function createTextGenerator(apiKey: string): TextGenerator {
  const modelFactory = createGoogleGenerativeAI({ apiKey });
  return async ({ modelName, staged, instruction }) => {
    const { text } = await generateText({
      model: modelFactory(modelName),
      messages: [
        {
          role: "user",
          content: [
            { type: "file", data: new URL(staged.uri), mediaType: staged.mimeType },
            { type: "text", text: instruction },
          ],
        },
      ],
    });
    return text;
  };
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export interface GeminiClientOptions {
  modelName: string;
  logger: Logger;
  apiKey?: string;
  files?: StagingFiles;
  generateText?: TextGenerator;
  pollAttempts?: number;
  pollDelayMs?: number;
}

export class GeminiClient {
  private modelName: string;
  private logger: Logger;
  private files: StagingFiles;
  private generateText: TextGenerator;
  private pollAttempts: number;
  private pollDelayMs: number;

  constructor(options: GeminiClientOptions) {
    this.modelName = options.modelName;
    this.logger = options.logger;
    this.pollAttempts = options.pollAttempts ?? 60;
    this.pollDelayMs = options.pollDelayMs ?? 2000;

    if (options.files && options.generateText) {
      this.files = options.files;
      this.generateText = options.generateText;
      return;
    }
    const apiKey = options.apiKey;
    if (!apiKey) {
      throw new ConfigurationError("GOOGLE_GENERATIVE_AI_API_KEY is required for Gemini access");
    }
    this.files = options.files ?? createStagingFiles(apiKey);
    this.generateText = options.generateText ?? createTextGenerator(apiKey);
  }

  /** Uploads the audio once so several instructions can reference it. */
  async stage(localPath: string): Promise<StagedAudio> {
    const mimeType = audioMimeType(localPath);
    if (!mimeType) {
      throw new GenerationError(`Unsupported audio format: ${basename(localPath)}`);
    }

    try {
      const uploaded = await this.files.upload({
        file: localPath,
        config: { mimeType, displayName: basename(localPath) },
      });
      if (!uploaded.name) {
        throw new Error("Gemini upload returned no file name");
      }

      let remote = uploaded;
      for (
        let attempt = 0;
        remote.state === FileState.PROCESSING && attempt < this.pollAttempts;
        attempt += 1
      ) {
        await sleep(this.pollDelayMs);
        remote = await this.files.get({ name: uploaded.name });
      }

      if (remote.state === FileState.PROCESSING) {
        throw new Error(`Gemini is still processing ${uploaded.name}`);
      }
      if (remote.state === FileState.FAILED) {
        throw new Error(`Gemini could not process ${uploaded.name}`);
      }
      if (!remote.uri) {
        throw new Error(`Gemini returned no URI for ${uploaded.name}`);
      }

      const staged: StagedAudio = {
        name: uploaded.name,
        uri: remote.uri,
        mimeType: remote.mimeType ?? mimeType,
      };
      this.logger.info("gemini_audio_staged", { localPath, name: staged.name });
      return staged;
    } catch (error) {
      this.logger.error("gemini_stage_failed", { localPath, error });
      throw new GenerationError(`Staging audio failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** One generation request per instruction; there is no batching. */
  async generateFromStaged(staged: StagedAudio, instruction: string): Promise<string> {
    let text: string;
    try {
      text = await this.generateText({ modelName: this.modelName, staged, instruction });
    } catch (error) {
      this.logger.error("gemini_generate_failed", { file: staged.name, error });
      throw new GenerationError(`Generation failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!text.trim()) {
      this.logger.warn("gemini_generate_empty", { file: staged.name });
      throw new GenerationError("Gemini returned an empty response");
    }
    this.logger.info("gemini_generate_complete", { file: staged.name, length: text.length });
    return text;
  }

  async generate(localPath: string, instruction: string): Promise<string> {
    return this.generateFromStaged(await this.stage(localPath), instruction);
  }
}
