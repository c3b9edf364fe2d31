export interface CandidateFields {
  fullName: string;
  /** Calendar date, `YYYY-MM-DD`. */
  dateOfBirth: string;
  contactNumber: string;
  address: string;
  qualification: string;
  graduationYear: number;
  yearsOfExperience: number;
  skills: string[];
}

export interface CandidateRecord extends CandidateFields {
  id: number;
  resumeFilename: string;
  resumePath: string;
  createdAt: string;
}

export interface CandidateQuery {
  skill?: string;
  minExperience?: number;
  graduationYear?: number;
}

export type CandidateFormFieldName =
  | "Full_Name"
  | "DOB"
  | "Contact_Number"
  | "Address"
  | "Qualification"
  | "Graduation_Year"
  | "Years_of_Experience"
  | "Skills";

export type CandidateFormFields = Partial<Record<CandidateFormFieldName, unknown>>;

export interface StoredResume {
  filename: string;
  bytes: Buffer;
}

export interface DeleteCandidateResult {
  id: number;
  warning?: string;
  cleanupJobId?: string;
}
