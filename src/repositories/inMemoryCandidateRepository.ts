import { NotFoundError } from "../domain/errors";
import type { CandidateFields, CandidateRecord } from "../domain/model";
import { SerialLock } from "../infra/serialLock";
import { CandidateRepository, candidateNotFoundMessage } from "./candidateRepository";

const copyRecord = (record: CandidateRecord): CandidateRecord => ({ ...record, skills: [...record.skills] });

export class InMemoryCandidateRepository implements CandidateRepository {
  private readonly store = new Map<number, CandidateRecord>();
  private readonly lock = new SerialLock();
  private lastId = 0;

  async create(fields: CandidateFields, resumeFilename: string, resumePath: string): Promise<CandidateRecord> {
    return this.lock.run(() => {
      const record: CandidateRecord = {
        ...fields,
        skills: [...fields.skills],
        id: this.lastId + 1,
        resumeFilename,
        resumePath,
        createdAt: new Date().toISOString()
      };

      this.lastId = record.id;
      this.store.set(record.id, record);
      return copyRecord(record);
    });
  }

  async get(id: number): Promise<CandidateRecord> {
    const record = this.store.get(id);

    if (!record) {
      throw new NotFoundError(candidateNotFoundMessage(id));
    }

    return copyRecord(record);
  }

  async list(): Promise<CandidateRecord[]> {
    return [...this.store.values()].map(copyRecord);
  }

  async delete(id: number): Promise<string> {
    return this.lock.run(() => {
      const record = this.store.get(id);

      if (!record) {
        throw new NotFoundError(candidateNotFoundMessage(id));
      }

      this.store.delete(id);
      return record.resumePath;
    });
  }
}
