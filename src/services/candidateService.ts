import { parseCandidateForm, validateResume } from "../domain/candidateInput";
import { StorageError, describeError } from "../domain/errors";
import type {
  CandidateFormFields,
  CandidateQuery,
  CandidateRecord,
  DeleteCandidateResult,
  StoredResume
} from "../domain/model";
import { filterCandidates } from "../filters/candidateFilter";
import type { Logger } from "../infra/logger";
import type { CleanupJobSnapshot, ResumeCleanupQueue } from "../queue/types";
import type { CandidateRepository } from "../repositories/candidateRepository";
import type { ContentStore } from "../storage/contentStore";
import { HttpError } from "../http/httpError";

export class CandidateService {
  private cleanupQueue?: ResumeCleanupQueue;

  constructor(
    private readonly repository: CandidateRepository,
    private readonly contentStore: ContentStore,
    private readonly logger: Logger
  ) {}

  setCleanupQueue(cleanupQueue: ResumeCleanupQueue): void {
    this.cleanupQueue = cleanupQueue;
  }

  async createCandidate(
    form: CandidateFormFields,
    resumeBytes: Buffer,
    resumeOriginalName: string
  ): Promise<CandidateRecord> {
    const fields = parseCandidateForm(form);
    validateResume(resumeOriginalName, resumeBytes);

    let resumePath: string;
    try {
      resumePath = await this.contentStore.put(resumeBytes, resumeOriginalName);
    } catch (error) {
      throw error instanceof StorageError
        ? error
        : new StorageError(`Resume could not be stored: ${describeError(error)}`, error);
    }

    try {
      return await this.repository.create(fields, resumeOriginalName, resumePath);
    } catch (error) {
      await this.discardResume(resumePath, "candidate_create_rollback_failed");
      throw error;
    }
  }

  async listCandidates(query: CandidateQuery = {}): Promise<CandidateRecord[]> {
    return filterCandidates(await this.repository.list(), query);
  }

  async getCandidate(candidateId: number): Promise<CandidateRecord> {
    return this.repository.get(candidateId);
  }

  async getResume(candidateId: number): Promise<StoredResume> {
    const candidate = await this.repository.get(candidateId);

    return {
      filename: candidate.resumeFilename,
      bytes: await this.contentStore.read(candidate.resumePath)
    };
  }

  async deleteCandidate(candidateId: number): Promise<DeleteCandidateResult> {
    const resumePath = await this.repository.delete(candidateId);

    try {
      await this.contentStore.delete(resumePath);
      return { id: candidateId };
    } catch (error) {
      const warning = `Candidate ${candidateId} was deleted but its resume could not be removed: ${describeError(error)}`;
      this.logger.warn("candidate_resume_delete_failed", warning);

      const cleanupJob = await this.enqueueCleanup(resumePath);
      return cleanupJob ? { id: candidateId, warning, cleanupJobId: cleanupJob.id } : { id: candidateId, warning };
    }
  }

  async getCleanupJob(jobId: string): Promise<CleanupJobSnapshot> {
    if (!this.cleanupQueue) {
      throw new HttpError(500, "Resume cleanup queue is not configured.");
    }

    return this.cleanupQueue.getJob(jobId);
  }

  private async discardResume(resumePath: string, event: string): Promise<void> {
    try {
      await this.contentStore.delete(resumePath);
    } catch (error) {
      this.logger.warn(event, `${resumePath}: ${describeError(error)}`);
      await this.enqueueCleanup(resumePath);
    }
  }

  private async enqueueCleanup(resumePath: string): Promise<CleanupJobSnapshot | undefined> {
    if (!this.cleanupQueue) {
      return undefined;
    }

    try {
      return await this.cleanupQueue.enqueue(resumePath);
    } catch (error) {
      this.logger.error("resume_cleanup_enqueue_failed", `${resumePath}: ${describeError(error)}`);
      return undefined;
    }
  }
}
