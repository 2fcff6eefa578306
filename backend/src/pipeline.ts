import type { CallbackDispatcher, DeliveryOutcome } from "./callback.dispatcher";
import type { PipelineOptions } from "./config";
import { errorMessage, StageFailureError } from "./errors";
import { buildCallbackPayload, type CallbackPayload, type Job, type JobResult, type TranscriptionOutput } from "./job";
import type { Logger } from "./logger";
import type { Summarizer } from "./summarizer";
import { mockTranscription, type Transcriber } from "./transcriber";

export type JobState =
  | "received"
  | "transcribing"
  | "transcription-skipped"
  | "summarizing"
  | "summarization-skipped"
  | "delivering"
  | "delivery-skipped"
  | "terminal";

export interface PipelineReport {
  jobId: string;
  result: JobResult;
  payload: CallbackPayload;
  states: JobState[];
  /** Absent when delivery was skipped. */
  delivery?: DeliveryOutcome;
}

interface PipelineDeps {
  options: PipelineOptions;
  transcriber: Transcriber;
  summarizer: Summarizer;
  dispatcher: CallbackDispatcher;
  logger: Logger;
}

/**
 * Runs one job through transcription, summarization and callback delivery.
 * Stage failures become part of the result; `execute` resolves exactly once per job.
 */
export class PipelineExecutor {
  private readonly options: PipelineOptions;

  constructor(private readonly deps: PipelineDeps) {
    this.options = Object.freeze({ ...deps.options });
  }

  async execute(job: Job): Promise<PipelineReport> {
    const { logger } = this.deps;
    const states: JobState[] = [];
    const enter = (state: JobState) => {
      states.push(state);
      logger.debug(`Job ${job.jobId}: ${state}`);
    };

    enter("received");
    logger.info(`Processing job ${job.jobId} (agent ${job.agentId}) for audio: ${job.audioPath}`);

    let result: JobResult;
    try {
      const transcription = await this.transcribe(job, enter);
      const summary = await this.summarize(job, transcription.text, enter);
      result = {
        status: "done",
        transcript: transcription.text,
        segments: transcription.segments,
        language: transcription.language,
        ...(summary !== undefined ? { summary } : {})
      };
      logger.info(`Job ${job.jobId} completed successfully`);
    } catch (err) {
      enter("summarization-skipped");
      const failure = err instanceof StageFailureError ? err : new StageFailureError("transcription", err);
      result = { status: "error", error: errorMessage(failure.cause, failure.message) };
      logger.error(`Job ${job.jobId} failed: ${failure.message}`);
    }

    const payload = buildCallbackPayload(job, result);
    const delivery = await this.deliver(job, payload, enter);
    enter("terminal");

    return { jobId: job.jobId, result, payload, states, delivery };
  }

  /** Resolves a job that cannot run as an error result, still delivering it. */
  async reject(job: Job, reason: string): Promise<PipelineReport> {
    const { logger } = this.deps;
    const states: JobState[] = [];
    const enter = (state: JobState) => {
      states.push(state);
      logger.debug(`Job ${job.jobId}: ${state}`);
    };

    enter("received");
    logger.error(`Job ${job.jobId} rejected: ${reason}`);
    const result: JobResult = { status: "error", error: reason };
    const payload = buildCallbackPayload(job, result);
    const delivery = await this.deliver(job, payload, enter);
    enter("terminal");

    return { jobId: job.jobId, result, payload, states, delivery };
  }

  private async transcribe(job: Job, enter: (state: JobState) => void): Promise<TranscriptionOutput> {
    if (!this.options.runTranscription) {
      enter("transcription-skipped");
      this.deps.logger.warn(`Job ${job.jobId}: transcription disabled, using mock transcript (no inference run)`);
      return mockTranscription();
    }

    enter("transcribing");
    try {
      return await this.deps.transcriber.transcribe(job.audioPath);
    } catch (err) {
      throw new StageFailureError("transcription", err);
    }
  }

  private async summarize(job: Job, text: string, enter: (state: JobState) => void): Promise<string | undefined> {
    if (!this.options.runSummarization) {
      enter("summarization-skipped");
      this.deps.logger.info(`Job ${job.jobId}: summarization disabled, skipping`);
      return undefined;
    }

    enter("summarizing");
    try {
      return await this.deps.summarizer.summarize(text);
    } catch (err) {
      // the transcript is still delivered; only the summary is dropped
      const failure = new StageFailureError("summarization", err);
      this.deps.logger.warn(`Job ${job.jobId}: ${failure.message}; delivering without summary`);
      return undefined;
    }
  }

  private async deliver(
    job: Job,
    payload: CallbackPayload,
    enter: (state: JobState) => void
  ): Promise<DeliveryOutcome | undefined> {
    if (!this.options.runCallback) {
      enter("delivery-skipped");
      this.deps.logger.info(`Job ${job.jobId}: callback disabled, skipping delivery`);
      return undefined;
    }

    const url = job.callbackUrl ?? this.options.defaultCallbackUrl;
    if (!url) {
      enter("delivery-skipped");
      this.deps.logger.warn(`Job ${job.jobId}: no callback URL and no default configured, skipping delivery`);
      return undefined;
    }

    enter("delivering");
    return this.deps.dispatcher.deliver(url, payload);
  }
}
