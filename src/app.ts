import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";
import { AnalysisService, CandidateSource } from "./analysis/analysis.service";
import { isRecord } from "./api/analyze.schemas";
import { buildAnalyzeController } from "./api/analyze.controller";
import { EnvConfig } from "./config/env";
import { createLogger, errorMessage, ManagedLogger } from "./config/logger";
import { ResumesRepository } from "./db/repositories/resumes.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import { ResumeFileService } from "./storage/resume-file.service";
import { SupabaseStorageClient } from "./storage/supabase-storage.client";

export interface AppContext {
  app: Express;
  logger: ManagedLogger;
}

export interface AppOverrides {
  logger?: ManagedLogger;
  candidateSource?: CandidateSource;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger =
    overrides.logger ??
    createLogger({
      minLevel: env.logLevel,
      file: env.logFile
        ? { path: env.logFile, maxBytes: env.logFileMaxBytes, backups: env.logFileBackups }
        : undefined,
    });
  logger.info("Resume ranker backend starting up...");

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  const supabaseConfig =
    env.supabaseUrl && env.supabaseKey ? { url: env.supabaseUrl, apiKey: env.supabaseKey } : undefined;
  const supabaseClient = supabaseConfig ? new SupabaseRestClient(supabaseConfig) : undefined;
  const storageClient = supabaseConfig
    ? new SupabaseStorageClient({ ...supabaseConfig, bucket: env.storageBucket })
    : undefined;
  if (supabaseConfig) {
    logger.info("Supabase client initialized successfully.");
  } else {
    logger.error("CRITICAL: Supabase is not configured; SUPABASE_URL and SUPABASE_KEY are required.");
  }

  const candidateSource = overrides.candidateSource ?? new ResumesRepository(logger, supabaseClient);
  const resumeFileService = new ResumeFileService(storageClient);
  const analysisService = new AnalysisService(
    candidateSource,
    resumeFileService,
    logger,
    env.resumeFetchLimit,
  );

  app.use("/api", cors({ origin: env.corsOrigin }));
  logger.info("CORS configured", { origin: env.corsOrigin });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use("/api", buildAnalyzeController({ analysisService, logger }));

  app.use((_request: Request, response: Response) => {
    response.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    if (isRecord(error) && error.type === "entity.parse.failed") {
      logger.warn("Request body is not valid JSON");
      response.status(400).json({ error: "Request body must be JSON" });
      return;
    }
    logger.error("Unhandled request error", { error: errorMessage(error) });
    response.status(500).json({ error: "An unexpected error occurred." });
  });

  return { app, logger };
}
