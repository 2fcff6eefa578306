import axios, { type AxiosInstance } from "axios";
import type { CallbackOptions } from "./config";
import { errorMessage } from "./errors";
import type { CallbackPayload } from "./job";
import type { Logger } from "./logger";
import { sleep as defaultSleep, type Sleep } from "./sleep";

/** Sends one request and resolves the response status. Rejects on connection errors and timeouts. */
export type CallbackTransport = (url: string, payload: CallbackPayload, timeoutMs: number) => Promise<number>;

export function axiosTransport(http: AxiosInstance = axios): CallbackTransport {
  return async (url, payload, timeoutMs) => {
    const response = await http.post(url, payload, {
      timeout: timeoutMs,
      // `timeout` only bounds socket idle time; the signal bounds the whole attempt
      signal: AbortSignal.timeout(timeoutMs),
      headers: { "Content-Type": "application/json" },
      // the receiver's answer is only judged by its status
      validateStatus: () => true
    });
    return response.status;
  };
}

export interface DeliveryOutcome {
  delivered: boolean;
  attempts: number;
  lastStatus?: number;
  lastError?: string;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class CallbackDispatcher {
  constructor(
    private readonly options: CallbackOptions,
    private readonly logger: Logger,
    private readonly transport: CallbackTransport = axiosTransport(),
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Delivers `payload` with at most `retryCount` retries, `retryDelaySeconds` apart.
   * Never throws: exhaustion is reported through the outcome and the log.
   */
  async deliver(url: string, payload: CallbackPayload): Promise<DeliveryOutcome> {
    const maxAttempts = this.options.retryCount + 1;
    const timeoutMs = this.options.timeoutSeconds * 1000;
    const jobId = payload.job_id;
    let lastStatus: number | undefined;
    let lastError: string | undefined;

    this.logger.info(`Job ${jobId}: sending ${payload.status} callback to ${url}`);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        lastStatus = await this.transport(url, payload, timeoutMs);
        lastError = undefined;
        if (isSuccess(lastStatus)) {
          this.logger.info(
            `Job ${jobId}: callback delivered to ${url} (attempt ${attempt}/${maxAttempts}). Status: ${lastStatus}`
          );
          return { delivered: true, attempts: attempt, lastStatus };
        }
        this.logger.error(`Job ${jobId}: callback got HTTP ${lastStatus} (attempt ${attempt}/${maxAttempts})`);
      } catch (err) {
        lastStatus = undefined;
        lastError = errorMessage(err);
        this.logger.error(`Job ${jobId}: callback request failed (attempt ${attempt}/${maxAttempts}): ${lastError}`);
      }

      if (attempt < maxAttempts) {
        this.logger.info(`Job ${jobId}: retrying callback in ${this.options.retryDelaySeconds}s`);
        await this.sleep(this.options.retryDelaySeconds * 1000);
      }
    }

    this.logger.error(`Job ${jobId}: all ${maxAttempts} callback attempts to ${url} failed`);
    return { delivered: false, attempts: maxAttempts, lastStatus, lastError };
  }
}
