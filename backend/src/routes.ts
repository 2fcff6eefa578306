import { Router } from "express";
import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "./errors";
import { isRecord, type Job, type Metadata } from "./job";
import type { Logger } from "./logger";
import type { JobQueue } from "./queue";

interface RouteDeps {
  queue: JobQueue;
  logger: Logger;
  defaultCallbackUrl?: string;
}

interface TranscriptionRequest {
  audioPath: string;
  agentId: string;
  callbackUrl?: string;
  metadata: Metadata;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/** Returns the request or the reason it was rejected. */
export function parseTranscriptionRequest(body: unknown): TranscriptionRequest | string {
  if (!isRecord(body)) return "Request body must be a JSON object.";

  const { audio_path, agent_id, callback_url, metadata } = body;
  if (typeof audio_path !== "string" || audio_path.trim().length === 0) {
    return "audio_path must be a non-empty string.";
  }
  if (typeof agent_id !== "string") {
    return "agent_id must be a string.";
  }

  let callbackUrl: string | undefined;
  if (callback_url !== undefined && callback_url !== null) {
    if (typeof callback_url !== "string" || !isHttpUrl(callback_url)) {
      return "callback_url must be an http(s) URL.";
    }
    callbackUrl = callback_url;
  }

  let jobMetadata: Metadata = {};
  if (metadata !== undefined && metadata !== null) {
    if (!isRecord(metadata)) return "metadata must be a JSON object.";
    jobMetadata = metadata;
  }

  return { audioPath: audio_path.trim(), agentId: agent_id, callbackUrl, metadata: jobMetadata };
}

export function buildRoutes(deps: RouteDeps): Router {
  const router = Router();

  router.post("/transcriptions", async (req, res) => {
    const request = parseTranscriptionRequest(req.body);
    if (typeof request === "string") {
      res.status(400).json({ error: request });
      return;
    }

    deps.logger.info(`Received transcription request for audio: ${request.audioPath}`);
    const job: Job = {
      jobId: uuidv4(),
      audioPath: request.audioPath,
      agentId: request.agentId,
      callbackUrl: request.callbackUrl ?? deps.defaultCallbackUrl,
      metadata: request.metadata
    };
    if (!job.callbackUrl) {
      deps.logger.warn(`No callback URL provided for job ${job.jobId}`);
    }

    try {
      await deps.queue.enqueue(job);
    } catch (error) {
      const message = errorMessage(error, "Failed to enqueue transcription job.");
      deps.logger.error(`Failed to enqueue job ${job.jobId}: ${message}`);
      res.status(503).json({ error: `Failed to enqueue transcription job: ${message}` });
      return;
    }

    deps.logger.info(`Job ${job.jobId} queued`);
    res.status(202).json({ job_id: job.jobId, status: "queued" });
  });

  return router;
}
