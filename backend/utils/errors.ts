export type SummarizerErrorKind =
  | "MalformedTrigger"
  | "UnsupportedFormat"
  | "ExtractionJobFailed"
  | "ExtractionTimeout"
  | "ExtractionFailed"
  | "SummarizationFailed"
  | "RateLimitExceeded";

/**
 * Base class for every failure the pipeline reports back to the caller.
 * statusCode is what the Lambda handler returns for it.
 */
export abstract class SummarizerError extends Error {
  abstract readonly kind: SummarizerErrorKind;
  abstract readonly statusCode: 400 | 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedTriggerError extends SummarizerError {
  readonly kind = "MalformedTrigger";
  readonly statusCode = 400;
}

export class UnsupportedFormatError extends SummarizerError {
  readonly kind = "UnsupportedFormat";
  readonly statusCode = 400;

  constructor(readonly key: string, readonly extension: string) {
    super(`Unsupported document format "${extension || "(none)"}" for key ${key}`);
  }
}

export class ExtractionJobFailedError extends SummarizerError {
  readonly kind = "ExtractionJobFailed";
  readonly statusCode = 500;

  constructor(readonly jobId: string, statusMessage?: string) {
    super(`Text detection job ${jobId} failed${statusMessage ? `: ${statusMessage}` : ""}`);
  }
}

export class ExtractionTimeoutError extends SummarizerError {
  readonly kind = "ExtractionTimeout";
  readonly statusCode = 500;

  constructor(readonly jobId: string, readonly attempts: number) {
    super(`Text detection job ${jobId} did not finish after ${attempts} polls`);
  }
}

export class ExtractionFailedError extends SummarizerError {
  readonly kind = "ExtractionFailed";
  readonly statusCode = 500;
}

export class SummarizationFailedError extends SummarizerError {
  readonly kind = "SummarizationFailed";
  readonly statusCode = 500;
}

export class RateLimitExceededError extends SummarizerError {
  readonly kind = "RateLimitExceeded";
  readonly statusCode = 500;

  constructor(readonly attempts: number, options?: { cause?: unknown }) {
    super(`Model is still throttling after ${attempts} attempts`, options);
  }
}

/**
 * Raised by a TextModel when the service rejects the call for rate limiting
 */
export class ThrottlingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ThrottlingError";
  }
}
