import { describe, expect, it, vi } from "vitest";
import { NotFoundError, StorageError, ValidationError } from "../domain/errors";
import type { CandidateFields, CandidateRecord } from "../domain/model";
import type { Logger } from "../infra/logger";
import type { CleanupJobSnapshot, ResumeCleanupQueue } from "../queue/types";
import { InMemoryCandidateRepository } from "../repositories/inMemoryCandidateRepository";
import { MemoryContentStore, sampleForm } from "../testing/memoryContentStore";
import { CandidateService } from "./candidateService";

const buildLogger = () => ({
  info: vi.fn<[string, string?], void>(),
  warn: vi.fn<[string, string?], void>(),
  error: vi.fn<[string, string?], void>()
});

const setup = () => {
  const repository = new InMemoryCandidateRepository();
  const contentStore = new MemoryContentStore();
  const logger = buildLogger();
  const service = new CandidateService(repository, contentStore, logger satisfies Logger);

  return { repository, contentStore, logger, service };
};

const resume = Buffer.from("%PDF-1.4 test");

class RecordingCleanupQueue implements ResumeCleanupQueue {
  readonly paths: string[] = [];

  async enqueue(resumePath: string): Promise<CleanupJobSnapshot> {
    this.paths.push(resumePath);
    return {
      id: `job-${this.paths.length}`,
      status: "QUEUED",
      resumePath,
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z"
    };
  }

  async getJob(jobId: string): Promise<CleanupJobSnapshot> {
    throw new NotFoundError(`Cleanup job ${jobId} was not found.`);
  }
}

class FailingCreateRepository extends InMemoryCandidateRepository {
  async create(_fields: CandidateFields, _resumeFilename: string, _resumePath: string): Promise<CandidateRecord> {
    throw new StorageError("insert failed");
  }
}

describe("CandidateService", () => {
  it("creates a record with parsed skills and the stored resume path", async () => {
    const { service, contentStore } = setup();

    const candidate = await service.createCandidate(sampleForm({ Skills: "Python, FastAPI, SQL" }), resume, "ada.pdf");

    expect(candidate).toMatchObject({
      id: 1,
      fullName: "Ada Example",
      skills: ["Python", "FastAPI", "SQL"],
      resumeFilename: "ada.pdf",
      resumePath: "memory/1-ada.pdf"
    });
    expect(contentStore.files.get("memory/1-ada.pdf")?.toString()).toBe("%PDF-1.4 test");
  });

  it("rejects invalid input before touching the content store", async () => {
    const { service, contentStore } = setup();

    await expect(
      service.createCandidate(sampleForm({ Graduation_Year: "next year" }), resume, "ada.pdf")
    ).rejects.toMatchObject({ name: "ValidationError", field: "Graduation_Year" });
    await expect(service.createCandidate(sampleForm(), resume, "ada.exe")).rejects.toBeInstanceOf(ValidationError);
    expect(contentStore.putCalls).toBe(0);
  });

  it("creates no record when the resume cannot be stored", async () => {
    const { service, contentStore } = setup();
    contentStore.failPut = true;

    await expect(service.createCandidate(sampleForm(), resume, "ada.pdf")).rejects.toBeInstanceOf(StorageError);
    expect(await service.listCandidates()).toEqual([]);
  });

  it("wraps unexpected content store failures as StorageError", async () => {
    const { service, contentStore } = setup();
    vi.spyOn(contentStore, "put").mockRejectedValueOnce(new Error("EIO"));

    await expect(service.createCandidate(sampleForm(), resume, "ada.pdf")).rejects.toThrow(
      "Resume could not be stored: EIO"
    );
  });

  it("removes the stored resume when the record cannot be created", async () => {
    const contentStore = new MemoryContentStore();
    const service = new CandidateService(new FailingCreateRepository(), contentStore, buildLogger());

    await expect(service.createCandidate(sampleForm(), resume, "ada.pdf")).rejects.toThrow("insert failed");
    expect(contentStore.deleteCalls).toEqual(["memory/1-ada.pdf"]);
    expect(contentStore.files.size).toBe(0);
  });

  it("keeps the original error and queues cleanup when the rollback delete fails", async () => {
    const contentStore = new MemoryContentStore();
    contentStore.failDelete = true;
    const logger = buildLogger();
    const queue = new RecordingCleanupQueue();
    const service = new CandidateService(new FailingCreateRepository(), contentStore, logger);
    service.setCleanupQueue(queue);

    await expect(service.createCandidate(sampleForm(), resume, "ada.pdf")).rejects.toThrow("insert failed");
    expect(logger.warn).toHaveBeenCalledWith("candidate_create_rollback_failed", "memory/1-ada.pdf: permission denied");
    expect(queue.paths).toEqual(["memory/1-ada.pdf"]);
  });

  it("runs the create, filter and delete scenario end to end", async () => {
    const { service } = setup();

    const a = await service.createCandidate(
      sampleForm({ Full_Name: "Candidate A", Skills: "Python, SQL", Years_of_Experience: "0", Graduation_Year: "2025" }),
      resume,
      "a.pdf"
    );
    const b = await service.createCandidate(
      sampleForm({ Full_Name: "Candidate B", Skills: "Java", Years_of_Experience: "3", Graduation_Year: "2025" }),
      resume,
      "b.pdf"
    );

    expect([a.id, b.id]).toEqual([1, 2]);
    expect(await service.listCandidates({ skill: "Python" })).toEqual([a]);
    expect(await service.listCandidates({ graduationYear: 2025 })).toEqual([a, b]);

    await service.deleteCandidate(1);

    await expect(service.getCandidate(1)).rejects.toBeInstanceOf(NotFoundError);
    expect(await service.listCandidates()).toEqual([b]);
  });

  it("filters by minimum experience inclusively", async () => {
    const { service } = setup();
    await service.createCandidate(sampleForm({ Years_of_Experience: "1.5" }), resume, "a.pdf");
    const exact = await service.createCandidate(sampleForm({ Years_of_Experience: "2.0" }), resume, "b.pdf");

    expect(await service.listCandidates({ minExperience: 2 })).toEqual([exact]);
  });

  it("keeps ids increasing across deletions", async () => {
    const { service } = setup();
    await service.createCandidate(sampleForm(), resume, "a.pdf");
    await service.createCandidate(sampleForm(), resume, "b.pdf");
    await service.deleteCandidate(2);
    await service.deleteCandidate(1);

    expect((await service.createCandidate(sampleForm(), resume, "c.pdf")).id).toBe(3);
  });

  it("deletes the resume together with the record", async () => {
    const { service, contentStore } = setup();
    const candidate = await service.createCandidate(sampleForm(), resume, "ada.pdf");

    expect(await service.deleteCandidate(candidate.id)).toEqual({ id: 1 });
    expect(contentStore.files.size).toBe(0);
  });

  it("leaves the content store alone when deleting an unknown id", async () => {
    const { service, contentStore } = setup();
    await service.createCandidate(sampleForm(), resume, "ada.pdf");

    await expect(service.deleteCandidate(42)).rejects.toBeInstanceOf(NotFoundError);
    expect(contentStore.deleteCalls).toEqual([]);
    expect(contentStore.files.size).toBe(1);
  });

  it("reports a failed resume delete as a warning without restoring the record", async () => {
    const { service, contentStore, logger } = setup();
    const queue = new RecordingCleanupQueue();
    service.setCleanupQueue(queue);
    await service.createCandidate(sampleForm(), resume, "ada.pdf");
    contentStore.failDelete = true;

    const result = await service.deleteCandidate(1);

    const warning = "Candidate 1 was deleted but its resume could not be removed: permission denied";
    expect(result).toEqual({ id: 1, warning, cleanupJobId: "job-1" });
    expect(logger.warn).toHaveBeenCalledWith("candidate_resume_delete_failed", warning);
    expect(queue.paths).toEqual(["memory/1-ada.pdf"]);
    await expect(service.getCandidate(1)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("returns the stored resume with its original name", async () => {
    const { service } = setup();
    await service.createCandidate(sampleForm(), resume, "Ada Resume.docx");

    const stored = await service.getResume(1);

    expect(stored.filename).toBe("Ada Resume.docx");
    expect(stored.bytes.toString()).toBe("%PDF-1.4 test");
  });

  it("requires a cleanup queue to look up cleanup jobs", async () => {
    const { service } = setup();

    await expect(service.getCleanupJob("job-1")).rejects.toThrow("Resume cleanup queue is not configured.");
  });
});
