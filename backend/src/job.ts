import { InvalidJobError, MalformedJobError } from "./errors";

export type Metadata = Record<string, unknown>;

/** A submitted transcription request. Never mutated after intake builds it. */
export interface Job {
  readonly jobId: string;
  readonly audioPath: string;
  readonly agentId: string;
  readonly callbackUrl?: string;
  readonly metadata: Metadata;
}

export interface Segment {
  start: number;
  end: number;
  text: string;
}

export interface TranscriptionOutput {
  text: string;
  segments: Segment[];
  language: string;
}

export type JobResult =
  | {
      status: "done";
      transcript: string;
      segments: Segment[];
      language: string;
      summary?: string;
    }
  | {
      status: "error";
      error: string;
    };

interface PayloadBase {
  job_id: string;
  audio_path: string;
  agent_id: string;
  metadata: Metadata;
}

export type CallbackPayload =
  | (PayloadBase & {
      status: "done";
      transcript: string;
      summary?: string;
      language: string;
      segments: Segment[];
    })
  | (PayloadBase & {
      status: "error";
      error: string;
    });

/** Queue wire format, shared with the intake process. */
interface JobRecord {
  job_id: string;
  audio_path: string;
  agent_id: string;
  callback_url: string | null;
  metadata: Metadata;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function encodeJob(job: Job): string {
  const record: JobRecord = {
    job_id: job.jobId,
    audio_path: job.audioPath,
    agent_id: job.agentId,
    callback_url: job.callbackUrl ?? null,
    metadata: job.metadata
  };
  return JSON.stringify(record);
}

export function decodeJob(raw: string): Job {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedJobError("Job record is not valid JSON.", raw);
  }

  if (!isRecord(parsed)) {
    throw new MalformedJobError("Job record must be a JSON object.", raw);
  }

  const { job_id, audio_path, agent_id, callback_url, metadata } = parsed;
  if (typeof job_id !== "string" || job_id.length === 0) {
    throw new MalformedJobError("Job record has no job_id.", raw);
  }

  const problems: string[] = [];
  if (typeof audio_path !== "string" || audio_path.length === 0) problems.push("missing audio_path");
  if (typeof agent_id !== "string") problems.push("missing agent_id");
  if (callback_url !== undefined && callback_url !== null && typeof callback_url !== "string") {
    problems.push("invalid callback_url");
  }
  if (metadata !== undefined && metadata !== null && !isRecord(metadata)) problems.push("invalid metadata");

  const job: Job = {
    jobId: job_id,
    audioPath: typeof audio_path === "string" ? audio_path : "",
    agentId: typeof agent_id === "string" ? agent_id : "",
    callbackUrl: typeof callback_url === "string" && callback_url.length > 0 ? callback_url : undefined,
    metadata: isRecord(metadata) ? metadata : {}
  };

  if (problems.length > 0) {
    throw new InvalidJobError(`Invalid job record: ${problems.join(", ")}.`, raw, job);
  }
  return job;
}

export function buildCallbackPayload(job: Job, result: JobResult): CallbackPayload {
  const base: PayloadBase = {
    job_id: job.jobId,
    audio_path: job.audioPath,
    agent_id: job.agentId,
    metadata: job.metadata
  };

  if (result.status === "error") {
    return { ...base, status: "error", error: result.error };
  }

  return {
    ...base,
    status: "done",
    transcript: result.transcript,
    ...(result.summary !== undefined ? { summary: result.summary } : {}),
    language: result.language,
    segments: result.segments
  };
}
