import { createApp } from "./app";
import { config } from "./config";
import { processLogger } from "./infra/logger";
import { createPostgresPool } from "./infra/postgres";
import { BullMqResumeCleanupQueue } from "./queue/bullMqResumeCleanupQueue";
import { InMemoryResumeCleanupQueue } from "./queue/inMemoryResumeCleanupQueue";
import type { ResumeCleanupQueue } from "./queue/types";
import type { CandidateRepository } from "./repositories/candidateRepository";
import { InMemoryCandidateRepository } from "./repositories/inMemoryCandidateRepository";
import { PostgresCandidateRepository } from "./repositories/postgresCandidateRepository";
import { CandidateService } from "./services/candidateService";
import { LocalContentStore } from "./storage/localContentStore";

const bootstrap = async (): Promise<void> => {
  const pool = config.databaseUrl ? createPostgresPool(config.databaseUrl) : undefined;

  const candidateRepository: CandidateRepository = pool
    ? new PostgresCandidateRepository(pool)
    : new InMemoryCandidateRepository();

  if (candidateRepository.init) {
    await candidateRepository.init();
  }

  const contentStore = new LocalContentStore(config.uploadDir);
  const candidateService = new CandidateService(candidateRepository, contentStore, processLogger);

  const processor = async (resumePath: string) => {
    await contentStore.delete(resumePath);
  };

  const cleanupQueue: ResumeCleanupQueue = config.redisUrl
    ? new BullMqResumeCleanupQueue({ redisUrl: config.redisUrl, processor })
    : new InMemoryResumeCleanupQueue({ processor });

  candidateService.setCleanupQueue(cleanupQueue);

  const app = createApp(candidateService, { maxResumeBytes: config.maxResumeBytes, logger: processLogger });

  const server = app.listen(config.port, () => {
    processLogger.info("candidate-registry running", `port ${config.port}`);
    processLogger.info(
      "storage",
      `repository=${pool ? "postgres" : "in-memory"} queue=${config.redisUrl ? "bullmq" : "in-memory"} uploads=${config.uploadDir}`
    );
  });

  const shutdown = (signal: string) => {
    processLogger.info("shutdown", signal);
    server.close(() => {
      Promise.all([cleanupQueue.close?.(), pool?.end()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          processLogger.error("shutdown_failed", error instanceof Error ? error.message : String(error));
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

bootstrap().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  processLogger.error("bootstrap_failed", message);
  process.exit(1);
});
