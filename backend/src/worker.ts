import dotenv from "dotenv";
import { loadConfig } from "./config";
import { createExecutor } from "./container";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import { connectRedis, RedisJobQueue, redisListClient } from "./queue";
import { WorkerLoop } from "./worker-loop";

dotenv.config();

const config = loadConfig();
const logger = createLogger("worker", config.bypassMode ? { mirrorFile: config.bypassLogFile } : {});
const redis = connectRedis(config.redisUrl, logger.child("redis"));
const queue = new RedisJobQueue(redisListClient(redis), config.queueName, logger.child("queue"));
const loop = new WorkerLoop(
  queue,
  createExecutor(config, logger),
  {
    dequeueTimeoutSeconds: config.dequeueTimeoutSeconds,
    retryDelaySeconds: config.queueRetryDelaySeconds,
    retryMaxDelaySeconds: config.queueRetryMaxDelaySeconds
  },
  logger
);

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, finishing the job in flight`);
  loop.stop();
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

loop
  .start()
  .then(() => queue.close())
  .catch((err: unknown) => {
    logger.error(`Worker crashed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
