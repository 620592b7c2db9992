/** Delegated authorization to act against Google Drive on the user's behalf. */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  /** Unix epoch milliseconds. Absent means the server gave no expiry. */
  expiresAt?: number;
  scopes: string[];
}

export type CredentialState =
  | { kind: "valid"; credential: Credential }
  | { kind: "expired"; credential: Credential }
  | { kind: "absent" }
  | { kind: "fault"; reason: string };

export interface QuizItem {
  question: string;
  answer: string;
}

export interface UploadResult {
  fileId: string;
  localPath: string;
  name: string;
  webViewLink?: string;
}

/** A file accepted by the Gemini Files API, referenced instead of resending bytes. */
export interface StagedAudio {
  name: string;
  uri: string;
  mimeType: string;
}

export type PipelineStage = "authorize" | "upload" | "stage" | "notes" | "quiz";

export interface PipelineFailure {
  stage: PipelineStage;
  message: string;
}

export interface StudyResult {
  localPath: string;
  notes?: string;
  rawQuiz?: string;
  quiz?: QuizItem[];
  upload?: UploadResult;
  failures: PipelineFailure[];
}
