import { Pool } from "pg";
import { NotFoundError, StorageError, describeError } from "../domain/errors";
import type { CandidateFields, CandidateRecord } from "../domain/model";
import { CandidateRepository, candidateNotFoundMessage } from "./candidateRepository";

interface CandidateRow {
  id: string;
  full_name: string;
  date_of_birth: string;
  contact_number: string;
  address: string;
  qualification: string;
  graduation_year: number;
  years_of_experience: number;
  skills: string[];
  resume_filename: string;
  resume_path: string;
  created_at: Date | string;
}

const selectColumns = `
  id, full_name, date_of_birth::text AS date_of_birth, contact_number, address, qualification,
  graduation_year, years_of_experience, skills, resume_filename, resume_path, created_at
`;

const mapRow = (row: CandidateRow): CandidateRecord => ({
  id: Number(row.id),
  fullName: row.full_name,
  dateOfBirth: row.date_of_birth,
  contactNumber: row.contact_number,
  address: row.address,
  qualification: row.qualification,
  graduationYear: row.graduation_year,
  yearsOfExperience: Number(row.years_of_experience),
  skills: row.skills,
  resumeFilename: row.resume_filename,
  resumePath: row.resume_path,
  createdAt: new Date(row.created_at).toISOString()
});

export class PostgresCandidateRepository implements CandidateRepository {
  constructor(private readonly pool: Pool) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS candidate_records (
        id BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
        full_name TEXT NOT NULL,
        date_of_birth DATE NOT NULL,
        contact_number TEXT NOT NULL,
        address TEXT NOT NULL,
        qualification TEXT NOT NULL,
        graduation_year INTEGER NOT NULL,
        years_of_experience DOUBLE PRECISION NOT NULL,
        skills JSONB NOT NULL,
        resume_filename TEXT NOT NULL,
        resume_path TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async create(fields: CandidateFields, resumeFilename: string, resumePath: string): Promise<CandidateRecord> {
    try {
      const { rows } = await this.pool.query<CandidateRow>(
        `
        INSERT INTO candidate_records (
          full_name, date_of_birth, contact_number, address, qualification,
          graduation_year, years_of_experience, skills, resume_filename, resume_path, created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11)
        RETURNING ${selectColumns}
        `,
        [
          fields.fullName,
          fields.dateOfBirth,
          fields.contactNumber,
          fields.address,
          fields.qualification,
          fields.graduationYear,
          fields.yearsOfExperience,
          JSON.stringify(fields.skills),
          resumeFilename,
          resumePath,
          new Date().toISOString()
        ]
      );

      return mapRow(rows[0]);
    } catch (error) {
      throw new StorageError(`Candidate record could not be stored: ${describeError(error)}`, error);
    }
  }

  async get(id: number): Promise<CandidateRecord> {
    const { rows } = await this.pool.query<CandidateRow>(
      `
      SELECT ${selectColumns}
      FROM candidate_records
      WHERE id = $1
      `,
      [id]
    );

    if (rows.length === 0) {
      throw new NotFoundError(candidateNotFoundMessage(id));
    }

    return mapRow(rows[0]);
  }

  async list(): Promise<CandidateRecord[]> {
    const { rows } = await this.pool.query<CandidateRow>(
      `
      SELECT ${selectColumns}
      FROM candidate_records
      ORDER BY id ASC
      `
    );

    return rows.map(mapRow);
  }

  async delete(id: number): Promise<string> {
    const { rows } = await this.pool.query<{ resume_path: string }>(
      `
      DELETE FROM candidate_records
      WHERE id = $1
      RETURNING resume_path
      `,
      [id]
    );

    if (rows.length === 0) {
      throw new NotFoundError(candidateNotFoundMessage(id));
    }

    return rows[0].resume_path;
  }
}
