import { errorMessage, InvalidJobError, MalformedJobError, QueueUnavailableError } from "./errors";
import type { Job } from "./job";
import type { Logger } from "./logger";
import type { PipelineExecutor, PipelineReport } from "./pipeline";
import type { JobQueue } from "./queue";
import { sleep as defaultSleep, type Sleep } from "./sleep";

export type IterationOutcome = "processed" | "rejected" | "idle" | "malformed" | "queue-unavailable" | "failed";

interface WorkerLoopConfig {
  dequeueTimeoutSeconds: number;
  retryDelaySeconds: number;
  retryMaxDelaySeconds: number;
}

export class WorkerLoop {
  private running = false;
  private backoffMs: number;

  constructor(
    private readonly queue: JobQueue,
    private readonly executor: Pick<PipelineExecutor, "execute" | "reject">,
    private readonly config: WorkerLoopConfig,
    private readonly logger: Logger,
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.backoffMs = config.retryDelaySeconds * 1000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Consumes jobs one at a time until `stop()` is called. */
  async start(): Promise<void> {
    this.running = true;
    this.logger.info("Worker started, waiting for jobs");
    while (this.running) {
      await this.runOnce();
    }
    this.logger.info("Worker stopped");
  }

  /** Takes effect once the job in flight (or the pending dequeue) finishes. */
  stop(): void {
    this.running = false;
  }

  async runOnce(): Promise<IterationOutcome> {
    let job: Job | null;
    try {
      job = await this.queue.dequeue(this.config.dequeueTimeoutSeconds);
    } catch (err) {
      if (err instanceof InvalidJobError) {
        return this.rejectJob(err);
      }
      if (err instanceof MalformedJobError) {
        this.logger.error(`Discarding malformed job record: ${err.message} Raw: ${err.raw}`);
        return "malformed";
      }
      const reason = err instanceof QueueUnavailableError ? err.message : `Unexpected dequeue error: ${errorMessage(err)}`;
      this.logger.warn(`${reason}. Retrying in ${this.backoffMs / 1000}s`);
      await this.sleep(this.backoffMs);
      this.backoffMs = Math.min(this.backoffMs * 2, this.config.retryMaxDelaySeconds * 1000);
      return "queue-unavailable";
    }

    this.backoffMs = this.config.retryDelaySeconds * 1000;
    if (!job) return "idle";

    try {
      this.logOutcome(await this.executor.execute(job));
      return "processed";
    } catch (err) {
      this.logger.error(`Job ${job.jobId} crashed the pipeline: ${errorMessage(err)}`);
      if (err instanceof Error) this.logger.error(err);
      return "failed";
    }
  }

  private async rejectJob(err: InvalidJobError): Promise<IterationOutcome> {
    this.backoffMs = this.config.retryDelaySeconds * 1000;
    this.logger.warn(`Job ${err.job.jobId} has an invalid record: ${err.message} Raw: ${err.raw}`);
    try {
      this.logOutcome(await this.executor.reject(err.job, err.message));
      return "rejected";
    } catch (failure) {
      this.logger.error(`Job ${err.job.jobId} could not be rejected: ${errorMessage(failure)}`);
      return "failed";
    }
  }

  private logOutcome(report: PipelineReport): void {
    const delivery = report.delivery
      ? `callback ${report.delivery.delivered ? "delivered" : "failed"} after ${report.delivery.attempts} attempt(s)`
      : "callback skipped";
    this.logger.info(`Job ${report.jobId} resolved as ${report.result.status}; ${delivery}`);
  }
}
