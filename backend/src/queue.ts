import Redis from "ioredis";
import { errorMessage, QueueUnavailableError } from "./errors";
import { decodeJob, encodeJob, type Job } from "./job";
import type { Logger } from "./logger";

/**
 * Hand-off between the intake process and the workers.
 * `dequeue` waits up to `timeoutSeconds` and resolves `null` when nothing arrived;
 * a job it returns is never handed to another consumer.
 */
export interface JobQueue {
  enqueue(job: Job): Promise<void>;
  dequeue(timeoutSeconds: number): Promise<Job | null>;
  close(): Promise<void>;
}

/** The Redis list commands the queue needs. */
export interface ListClient {
  rpush(key: string, value: string): Promise<number>;
  blpop(key: string, timeoutSeconds: number): Promise<[string, string] | null>;
  quit(): Promise<unknown>;
}

export function redisListClient(redis: Redis): ListClient {
  return {
    rpush: (key, value) => redis.rpush(key, value),
    blpop: (key, timeoutSeconds) => redis.blpop(key, timeoutSeconds),
    quit: () => redis.quit()
  };
}

export function connectRedis(url: string, logger: Logger): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: 3 });
  redis.on("error", (err: Error) => logger.warn(`Redis connection error: ${err.message}`));
  redis.on("ready", () => logger.info(`Connected to Redis at ${url}`));
  return redis;
}

export class RedisJobQueue implements JobQueue {
  constructor(
    private readonly client: ListClient,
    private readonly queueName: string,
    private readonly logger: Logger
  ) {}

  async enqueue(job: Job): Promise<void> {
    try {
      await this.client.rpush(this.queueName, encodeJob(job));
    } catch (err) {
      throw new QueueUnavailableError(`Could not enqueue job ${job.jobId}: ${errorMessage(err)}`, err);
    }
    this.logger.info(`Enqueued job ${job.jobId} on ${this.queueName}`);
  }

  async dequeue(timeoutSeconds: number): Promise<Job | null> {
    let popped: [string, string] | null;
    try {
      popped = await this.client.blpop(this.queueName, timeoutSeconds);
    } catch (err) {
      throw new QueueUnavailableError(`Could not dequeue from ${this.queueName}: ${errorMessage(err)}`, err);
    }
    if (!popped) return null;

    const job = decodeJob(popped[1]);
    this.logger.info(`Dequeued job ${job.jobId} from ${this.queueName}`);
    return job;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/** Single-process queue for tests and local runs without Redis. */
export class InMemoryJobQueue implements JobQueue {
  private readonly items: string[] = [];
  private readonly waiters: Array<(raw: string | null) => void> = [];

  async enqueue(job: Job): Promise<void> {
    this.pushRaw(encodeJob(job));
  }

  async dequeue(timeoutSeconds: number): Promise<Job | null> {
    const next = this.items.shift();
    if (next !== undefined) return decodeJob(next);

    const raw = await new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(null);
      }, timeoutSeconds * 1000);
      const waiter = (value: string | null) => {
        clearTimeout(timer);
        resolve(value);
      };
      this.waiters.push(waiter);
    });
    return raw === null ? null : decodeJob(raw);
  }

  /** Pushes an already-encoded record, as another producer would. */
  pushRaw(raw: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(raw);
      return;
    }
    this.items.push(raw);
  }

  get size(): number {
    return this.items.length;
  }

  async close(): Promise<void> {
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
