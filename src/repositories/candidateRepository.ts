import type { CandidateFields, CandidateRecord } from "../domain/model";

export interface CandidateRepository {
  init?(): Promise<void>;
  create(fields: CandidateFields, resumeFilename: string, resumePath: string): Promise<CandidateRecord>;
  /** Throws NotFoundError when no record has this id. */
  get(id: number): Promise<CandidateRecord>;
  /** All records, ascending id. */
  list(): Promise<CandidateRecord[]>;
  /** Removes the record and returns its resume path; throws NotFoundError when absent. */
  delete(id: number): Promise<string>;
}

export const candidateNotFoundMessage = (id: number): string => `Candidate ${id} was not found.`;
