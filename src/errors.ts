export type ErrorCode =
  | "configuration_error"
  | "authorization_error"
  | "generation_error"
  | "persistence_error";

abstract class StudyError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid client secret / environment. Fatal, never retried. */
export class ConfigurationError extends StudyError {
  readonly code = "configuration_error";
}

/** Consent declined, or refresh and the consent fallback both failed. */
export class AuthorizationError extends StudyError {
  readonly code = "authorization_error";
}

/** Staging or generation against Gemini failed; callers treat it as "no result". */
export class GenerationError extends StudyError {
  readonly code = "generation_error";
}

export class PersistenceError extends StudyError {
  readonly code = "persistence_error";
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error && error.message ? error.message : fallback;
}
