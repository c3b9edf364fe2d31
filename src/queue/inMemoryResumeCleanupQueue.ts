import { randomUUID } from "crypto";
import { NotFoundError, describeError } from "../domain/errors";
import { CleanupJobSnapshot, CleanupProcessor, ResumeCleanupQueue, cleanupJobNotFoundMessage } from "./types";

interface InMemoryResumeCleanupQueueOptions {
  processor: CleanupProcessor;
  attempts?: number;
  retryDelayMs?: number;
  maxFinishedJobs?: number;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class InMemoryResumeCleanupQueue implements ResumeCleanupQueue {
  private readonly jobs = new Map<string, CleanupJobSnapshot>();
  private readonly processor: CleanupProcessor;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly maxFinishedJobs: number;

  constructor(options: InMemoryResumeCleanupQueueOptions) {
    this.processor = options.processor;
    this.attempts = options.attempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.maxFinishedJobs = options.maxFinishedJobs ?? 1000;
  }

  async enqueue(resumePath: string): Promise<CleanupJobSnapshot> {
    const now = new Date().toISOString();
    const job: CleanupJobSnapshot = {
      id: randomUUID(),
      status: "QUEUED",
      resumePath,
      createdAt: now,
      updatedAt: now
    };

    this.jobs.set(job.id, job);

    setTimeout(() => {
      void this.process(job);
    }, 0);

    return { ...job };
  }

  async getJob(jobId: string): Promise<CleanupJobSnapshot> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(cleanupJobNotFoundMessage(jobId));
    }

    return { ...job };
  }

  private async process(job: CleanupJobSnapshot): Promise<void> {
    job.status = "RUNNING";
    job.updatedAt = new Date().toISOString();

    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        await this.processor(job.resumePath);
        job.status = "COMPLETED";
        job.error = undefined;
        job.updatedAt = new Date().toISOString();
        this.evictFinishedJobs();
        return;
      } catch (error) {
        job.error = describeError(error);
        job.updatedAt = new Date().toISOString();
      }

      if (attempt < this.attempts) {
        await wait(this.retryDelayMs);
      }
    }

    job.status = "FAILED";
    this.evictFinishedJobs();
  }

  // Oldest finished jobs go first; queued and running jobs are always kept.
  private evictFinishedJobs(): void {
    const finished = [...this.jobs.values()].filter((job) => job.status === "COMPLETED" || job.status === "FAILED");

    for (const job of finished.slice(0, Math.max(0, finished.length - this.maxFinishedJobs))) {
      this.jobs.delete(job.id);
    }
  }
}
