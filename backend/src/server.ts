import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { connectRedis, RedisJobQueue, redisListClient } from "./queue";

dotenv.config();

const config = loadConfig();
const logger = createLogger("api");
const redis = connectRedis(config.redisUrl, logger.child("redis"));
const queue = new RedisJobQueue(redisListClient(redis), config.queueName, logger.child("queue"));

const app = createApp({ queue, logger, defaultCallbackUrl: config.pipeline.defaultCallbackUrl });

app.listen(config.port, () => {
  logger.info(`Transcription intake listening on port ${config.port}`);
});
