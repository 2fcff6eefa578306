import type { Job } from "./job";

export type StageName = "transcription" | "summarization";

export function errorMessage(error: unknown, fallback = "Unknown error."): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string" && error.length > 0) return error;
  return fallback;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, detail: string) {
    super(`Invalid configuration for ${variable}: ${detail}`);
    this.name = "ConfigError";
  }
}

/** The queue store could not be reached. Retryable at the dequeue boundary. */
export class QueueUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "QueueUnavailableError";
  }
}

export class MalformedJobError extends Error {
  constructor(message: string, readonly raw: string) {
    super(message);
    this.name = "MalformedJobError";
  }
}

/**
 * A record that names a job but cannot be run as-is. `job` carries the usable
 * fields (defaults for the rest) so the failure can still be reported to the caller.
 */
export class InvalidJobError extends MalformedJobError {
  constructor(message: string, raw: string, readonly job: Job) {
    super(message, raw);
    this.name = "InvalidJobError";
  }
}

export class AudioSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AudioSourceError";
  }
}

export class StageFailureError extends Error {
  constructor(readonly stage: StageName, cause: unknown) {
    super(`${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StageFailureError";
  }
}
