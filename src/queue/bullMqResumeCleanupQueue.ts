import { Job, Queue, Worker } from "bullmq";
import IORedis from "ioredis";
import { NotFoundError } from "../domain/errors";
import { CleanupJobSnapshot, CleanupProcessor, ResumeCleanupQueue, cleanupJobNotFoundMessage } from "./types";

interface BullMqResumeCleanupQueueOptions {
  redisUrl: string;
  processor: CleanupProcessor;
}

interface CleanupJobData {
  resumePath: string;
}

export class BullMqResumeCleanupQueue implements ResumeCleanupQueue {
  private readonly connection: IORedis;
  private readonly queue: Queue<CleanupJobData>;
  private readonly worker: Worker<CleanupJobData>;

  constructor(options: BullMqResumeCleanupQueueOptions) {
    this.connection = new IORedis(options.redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false
    });

    const queueName = "resume_cleanup";
    this.queue = new Queue(queueName, { connection: this.connection });
    this.worker = new Worker(
      queueName,
      async (job: Job<CleanupJobData>) => {
        await options.processor(job.data.resumePath);
      },
      { connection: this.connection }
    );
  }

  async enqueue(resumePath: string): Promise<CleanupJobSnapshot> {
    const job = await this.queue.add(
      "delete-resume",
      { resumePath },
      { attempts: 3, backoff: { type: "exponential", delay: 1000 }, removeOnComplete: 1000, removeOnFail: 1000 }
    );

    const now = new Date().toISOString();

    return {
      id: String(job.id),
      status: "QUEUED",
      resumePath,
      createdAt: now,
      updatedAt: now
    };
  }

  async getJob(jobId: string): Promise<CleanupJobSnapshot> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      throw new NotFoundError(cleanupJobNotFoundMessage(jobId));
    }

    const state = await job.getState();
    const now = new Date().toISOString();

    return {
      id: String(job.id),
      status: this.mapState(state),
      resumePath: job.data.resumePath,
      createdAt: job.timestamp ? new Date(job.timestamp).toISOString() : now,
      updatedAt: now,
      error: job.failedReason || undefined
    };
  }

  async close(): Promise<void> {
    await this.worker.close();
    await this.queue.close();
    await this.connection.quit();
  }

  private mapState(state: string): CleanupJobSnapshot["status"] {
    if (state === "waiting" || state === "delayed" || state === "prioritized" || state === "waiting-children") {
      return "QUEUED";
    }

    if (state === "active") {
      return "RUNNING";
    }

    if (state === "completed") {
      return "COMPLETED";
    }

    if (state === "failed") {
      return "FAILED";
    }

    return "UNKNOWN";
  }
}
