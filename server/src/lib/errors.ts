/**
 * Error taxonomy shared by the tailoring pipeline and the HTTP layer.
 *
 * Every class carries a stable `code` and the HTTP status the serving layer
 * maps it to. Which of these propagate and which are absorbed is decided by
 * the component that catches them, not by the class.
 */

export type ErrorCode =
  | 'FETCH_FAILED'
  | 'EXTRACTION_FAILED'
  | 'LLM_UNAVAILABLE'
  | 'LLM_MALFORMED_OUTPUT'
  | 'PROFILE_INVALID'
  | 'RESEARCH_FAILED'
  | 'CONFIG_INVALID'
  | 'LANGUAGE_UNAVAILABLE';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or HTTP failure while retrieving a job posting URL. */
export class FetchError extends AppError {
  readonly code = 'FETCH_FAILED';
  readonly status = 502;
  readonly url: string;
  readonly httpStatus: number | null;

  constructor(url: string, message: string, options?: { httpStatus?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
    this.httpStatus = options?.httpStatus ?? null;
  }
}

/** Fetched content had no readable text. */
export class ExtractionError extends AppError {
  readonly code = 'EXTRACTION_FAILED';
  readonly status = 422;
}

/** Completion endpoint unreachable after the retry budget was spent. */
export class LLMUnavailableError extends AppError {
  readonly code = 'LLM_UNAVAILABLE';
  readonly status = 503;
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.attempts = attempts;
  }
}

/** Completion came back empty or could not be parsed into the expected shape. */
export class MalformedCompletionError extends AppError {
  readonly code = 'LLM_MALFORMED_OUTPUT';
  readonly status = 502;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Knowledge Base failed validation at load time. */
export class ValidationError extends AppError {
  readonly code = 'PROFILE_INVALID';
  readonly status = 500;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: { cause?: unknown }) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`
        : message,
      options,
    );
    this.issues = issues;
  }
}

/** No profile content exists in the requested document language. */
export class LanguageUnavailableError extends AppError {
  readonly code = 'LANGUAGE_UNAVAILABLE';
  readonly status = 400;
  readonly language: string;

  constructor(language: string, available: readonly string[]) {
    super(`Profile content is not available in "${language}" (available: ${available.join(', ')})`);
    this.language = language;
  }
}

/** Company research failed. Never leaves the research helper. */
export class ResearchError extends AppError {
  readonly code = 'RESEARCH_FAILED';
  readonly status = 502;
}

/** Process configuration could not be parsed from the environment. */
export class ConfigError extends AppError {
  readonly code = 'CONFIG_INVALID';
  readonly status = 500;
}

/**
 * HTTP failure from an upstream API (completion endpoint, search provider).
 * `status` mirrors the upstream response so retry logic can classify it.
 */
export class UpstreamHttpError extends Error {
  readonly status: number;
  readonly headers: Headers | undefined;

  constructor(message: string, status: number, headers?: Headers) {
    super(message);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.headers = headers;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
