import type { CandidateRecord } from "../domain/model";

export interface CandidatePayload {
  id: number;
  Full_Name: string;
  DOB: string;
  Contact_Number: string;
  Address: string;
  Qualification: string;
  Graduation_Year: number;
  Years_of_Experience: number;
  Skills: string[];
  resume_filename: string;
  resume_path: string;
  created_at: string;
}

export const toCandidatePayload = (record: CandidateRecord): CandidatePayload => ({
  id: record.id,
  Full_Name: record.fullName,
  DOB: record.dateOfBirth,
  Contact_Number: record.contactNumber,
  Address: record.address,
  Qualification: record.qualification,
  Graduation_Year: record.graduationYear,
  Years_of_Experience: record.yearsOfExperience,
  Skills: record.skills,
  resume_filename: record.resumeFilename,
  resume_path: record.resumePath,
  created_at: record.createdAt
});
