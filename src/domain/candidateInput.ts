import path from "path";
import { z } from "zod";
import { UnsupportedFileTypeError, ValidationError } from "./errors";
import type { CandidateFields, CandidateFormFields } from "./model";
import { parseSkills } from "./skills";

const allowedResumeExtensions = new Set([".pdf", ".doc", ".docx"]);

const asText = (value: unknown): unknown => {
  if (typeof value === "number") {
    return String(value);
  }

  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return value.join(",");
  }

  return value;
};

const text = () =>
  z.string({ required_error: "is required", invalid_type_error: "must be text" }).trim().min(1, "must not be empty");

const boundedText = (max: number) => text().max(max, `must be at most ${max} characters`);

const isCalendarDate = (value: string): boolean => {
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const buildCandidateFormSchema = (today: string) =>
  z.object({
    Full_Name: z.preprocess(asText, boundedText(100)),
    DOB: z.preprocess(
      asText,
      text()
        .regex(/^\d{4}-\d{2}-\d{2}$/, "must be in YYYY-MM-DD format")
        .refine(isCalendarDate, "must be a valid calendar date")
        .refine((value) => value <= today, "cannot be in the future")
    ),
    Contact_Number: z.preprocess(asText, text()),
    Address: z.preprocess(asText, boundedText(300)),
    Qualification: z.preprocess(asText, boundedText(120)),
    Graduation_Year: z.preprocess(
      asText,
      text()
        .regex(/^-?\d+$/, "must be an integer")
        .transform(Number)
        .pipe(z.number().min(1950, "must be between 1950 and 2100").max(2100, "must be between 1950 and 2100"))
    ),
    Years_of_Experience: z.preprocess(
      asText,
      text()
        .regex(/^\d+(\.\d+)?$/, "must be a non-negative number")
        .transform(Number)
        .pipe(z.number().max(60, "must be at most 60"))
    ),
    Skills: z.preprocess(
      asText,
      text()
        .transform(parseSkills)
        .pipe(z.array(z.string()).min(1, "must contain at least one skill"))
    )
  });

export const parseCandidateForm = (form: CandidateFormFields, now: Date = new Date()): CandidateFields => {
  const parsed = buildCandidateFormSchema(now.toISOString().slice(0, 10)).safeParse(form);

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = String(issue.path[0] ?? "form");
    throw new ValidationError(field, `${field} ${issue.message}`);
  }

  const data = parsed.data;

  return {
    fullName: data.Full_Name,
    dateOfBirth: data.DOB,
    contactNumber: data.Contact_Number,
    address: data.Address,
    qualification: data.Qualification,
    graduationYear: data.Graduation_Year,
    yearsOfExperience: data.Years_of_Experience,
    skills: data.Skills
  };
};

export const validateResume = (originalName: string, bytes: Buffer): void => {
  const extension = path.extname(originalName).toLowerCase();

  if (!allowedResumeExtensions.has(extension)) {
    throw new UnsupportedFileTypeError(extension);
  }

  if (bytes.length === 0) {
    throw new ValidationError("Resume", "Resume must not be empty");
  }
};
