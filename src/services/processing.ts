import type { OAuthAuthorizer } from "../auth/oauthAuthorizer.js";
import type { DriveClient } from "../clients/drive.js";
import type { GeminiClient } from "../clients/gemini.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { NOTES_INSTRUCTION, buildQuizInstruction } from "../prompts.js";
import type {
  Credential,
  PipelineFailure,
  QuizItem,
  StagedAudio,
  StudyResult,
  UploadResult,
} from "../types.js";
import { parseQuiz } from "./quizParser.js";

export interface ProcessingServiceDeps {
  authorizer: Pick<OAuthAuthorizer, "authorize">;
  driveClient: Pick<DriveClient, "uploadFile">;
  geminiClient: Pick<GeminiClient, "stage" | "generateFromStaged">;
  logger: Logger;
  quizQuestionCount: number;
  defaultFolderId?: string;
}

export interface ProcessAudioInput {
  localPath: string;
  folderId?: string;
  /** Upload even without a folder id (into My Drive); false skips Drive entirely. */
  uploadToDrive?: boolean;
}

interface GenerationOutcome {
  notes?: string;
  rawQuiz?: string;
  quiz?: QuizItem[];
}

export class ProcessingService {
  private authorizer: Pick<OAuthAuthorizer, "authorize">;
  private drive: Pick<DriveClient, "uploadFile">;
  private gemini: Pick<GeminiClient, "stage" | "generateFromStaged">;
  private logger: Logger;
  private quizQuestionCount: number;
  private defaultFolderId?: string;

  constructor(deps: ProcessingServiceDeps) {
    this.authorizer = deps.authorizer;
    this.drive = deps.driveClient;
    this.gemini = deps.geminiClient;
    this.logger = deps.logger;
    this.quizQuestionCount = deps.quizQuestionCount;
    this.defaultFolderId = deps.defaultFolderId;
  }

  /**
   * Runs the Drive branch and the Gemini branch side by side. A failure in
   * one branch leaves the other's results intact and is reported in
   * `failures` instead of being thrown.
   */
  async processAudio(input: ProcessAudioInput): Promise<StudyResult> {
    const { localPath } = input;
    const folderId = input.folderId ?? this.defaultFolderId;
    const shouldUpload = input.uploadToDrive ?? Boolean(folderId);
    this.logger.info("process_audio_start", { localPath, folderId, shouldUpload });

    const failures: PipelineFailure[] = [];
    const [upload, generated] = await Promise.all([
      shouldUpload ? this.archive(localPath, folderId, failures) : Promise.resolve(undefined),
      this.generateStudyMaterial(localPath, failures),
    ]);

    const result: StudyResult = { localPath, ...generated, failures };
    if (upload) result.upload = upload;
    this.logger.info("process_audio_complete", {
      localPath,
      hasNotes: Boolean(result.notes),
      quizItems: result.quiz?.length ?? 0,
      uploaded: Boolean(result.upload),
      failures: failures.map((failure) => failure.stage),
    });
    return result;
  }

  private async archive(
    localPath: string,
    folderId: string | undefined,
    failures: PipelineFailure[],
  ): Promise<UploadResult | undefined> {
    let credential: Credential;
    try {
      credential = await this.authorizer.authorize();
    } catch (error) {
      this.logger.error("process_audio_authorize_failed", { localPath, error });
      failures.push({ stage: "authorize", message: errorMessage(error, "Authorization failed") });
      return undefined;
    }

    const upload = await this.drive.uploadFile(localPath, credential, folderId);
    if (!upload) {
      failures.push({ stage: "upload", message: "Upload to Google Drive failed" });
    }
    return upload;
  }

  private async generateStudyMaterial(
    localPath: string,
    failures: PipelineFailure[],
  ): Promise<GenerationOutcome> {
    let staged: StagedAudio;
    try {
      staged = await this.gemini.stage(localPath);
    } catch (error) {
      failures.push({ stage: "stage", message: errorMessage(error, "Staging failed") });
      return {};
    }

    const outcome: GenerationOutcome = {};
    try {
      outcome.notes = await this.gemini.generateFromStaged(staged, NOTES_INSTRUCTION);
    } catch (error) {
      failures.push({ stage: "notes", message: errorMessage(error, "Notes generation failed") });
    }

    try {
      const rawQuiz = await this.gemini.generateFromStaged(
        staged,
        buildQuizInstruction(this.quizQuestionCount),
      );
      outcome.rawQuiz = rawQuiz;
      outcome.quiz = parseQuiz(rawQuiz);
      this.logger.info("process_audio_quiz_parsed", {
        localPath,
        requested: this.quizQuestionCount,
        parsed: outcome.quiz.length,
      });
    } catch (error) {
      failures.push({ stage: "quiz", message: errorMessage(error, "Quiz generation failed") });
    }
    return outcome;
  }
}
