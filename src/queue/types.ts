export type CleanupJobStatus = "QUEUED" | "RUNNING" | "COMPLETED" | "FAILED" | "UNKNOWN";

export interface CleanupJobSnapshot {
  id: string;
  status: CleanupJobStatus;
  resumePath: string;
  createdAt: string;
  updatedAt: string;
  error?: string;
}

export type CleanupProcessor = (resumePath: string) => Promise<void>;

export interface ResumeCleanupQueue {
  enqueue(resumePath: string): Promise<CleanupJobSnapshot>;
  getJob(jobId: string): Promise<CleanupJobSnapshot>;
  close?(): Promise<void>;
}

export const cleanupJobNotFoundMessage = (jobId: string): string => `Cleanup job ${jobId} was not found.`;
