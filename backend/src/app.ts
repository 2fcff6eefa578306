import cors from "cors";
import express, { type Express } from "express";
import type { Logger } from "./logger";
import type { JobQueue } from "./queue";
import { buildRoutes } from "./routes";

interface AppDeps {
  queue: JobQueue;
  logger: Logger;
  defaultCallbackUrl?: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.use(buildRoutes(deps));

  return app;
}
