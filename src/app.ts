import express from "express";
import multer from "multer";
import { ValidationError } from "./domain/errors";
import { buildCandidateRoutes } from "./http/candidateRoutes";
import { HttpError } from "./http/httpError";
import type { Logger } from "./infra/logger";
import { CandidateService } from "./services/candidateService";

interface AppOptions {
  maxResumeBytes: number;
  logger: Logger;
}

export const createApp = (candidateService: CandidateService, options: AppOptions) => {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: "candidate-registry",
      timestamp: new Date().toISOString()
    });
  });

  app.use("/api/v1/candidates", buildCandidateRoutes(candidateService, { maxResumeBytes: options.maxResumeBytes }));

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(error.statusCode).json({
        error: error.name,
        message: error.message,
        field: error.field
      });
      return;
    }

    if (error instanceof HttpError) {
      if (error.statusCode >= 500) {
        options.logger.error("request_failed", `${error.name}: ${error.message}`);
      }

      res.status(error.statusCode).json({
        error: error.name,
        message: error.message
      });
      return;
    }

    if (error instanceof multer.MulterError) {
      res.status(error.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({
        error: "UploadError",
        message: error.message,
        field: error.field
      });
      return;
    }

    const message = error instanceof Error ? error.message : "Unexpected server error";
    options.logger.error("request_failed", error instanceof Error ? error.stack ?? message : message);
    res.status(500).json({
      error: "InternalServerError",
      message
    });
  });

  return app;
};
