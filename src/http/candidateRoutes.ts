import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { ValidationError } from "../domain/errors";
import type { CandidateFormFields } from "../domain/model";
import { CandidateService } from "../services/candidateService";
import { toCandidatePayload } from "./candidatePayload";

const optionalQueryValue = (value: unknown) => (value === "" ? undefined : value);

const decimalQueryValue = (pattern: RegExp, message: string) =>
  z.string().regex(pattern, message).transform(Number);

const listCandidatesQuerySchema = z.object({
  skill: z.string().optional(),
  Min_Experience: z.preprocess(
    optionalQueryValue,
    decimalQueryValue(/^\d+(\.\d+)?$/, "must be a non-negative number").pipe(z.number().finite()).optional()
  ),
  Graduation_Year: z.preprocess(
    optionalQueryValue,
    decimalQueryValue(/^\d+$/, "must be an integer").pipe(z.number().min(1950).max(2100)).optional()
  )
});

const candidateIdSchema = z
  .string()
  .regex(/^\d+$/, "must be a decimal id")
  .transform(Number)
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

// multer reads multipart file names as latin1; browsers and fetch send UTF-8.
const decodeUploadName = (name: string): string => Buffer.from(name, "latin1").toString("utf8");

interface CandidateRoutesOptions {
  maxResumeBytes: number;
}

export const buildCandidateRoutes = (candidateService: CandidateService, options: CandidateRoutesOptions): Router => {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxResumeBytes,
      files: 1
    }
  });

  router.get("/", async (req, res, next) => {
    const parsed = listCandidatesQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      res.status(400).json({
        error: "ValidationError",
        message: parsed.error.flatten()
      });
      return;
    }

    try {
      const items = await candidateService.listCandidates({
        skill: parsed.data.skill,
        minExperience: parsed.data.Min_Experience,
        graduationYear: parsed.data.Graduation_Year
      });
      res.json({ items: items.map(toCandidatePayload) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/", upload.single("Resume"), async (req, res, next) => {
    try {
      if (!req.file) {
        throw new ValidationError("Resume", "Resume is required");
      }

      const form: CandidateFormFields = req.body ?? {};
      const candidate = await candidateService.createCandidate(
        form,
        req.file.buffer,
        decodeUploadName(req.file.originalname)
      );
      res.status(201).json(toCandidatePayload(candidate));
    } catch (error) {
      next(error);
    }
  });

  router.get("/cleanup-jobs/:jobId", async (req, res, next) => {
    try {
      res.json(await candidateService.getCleanupJob(req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  router.get("/:candidateId", async (req, res, next) => {
    const parsed = candidateIdSchema.safeParse(req.params.candidateId);

    if (!parsed.success) {
      res.status(400).json({
        error: "ValidationError",
        message: parsed.error.flatten()
      });
      return;
    }

    try {
      res.json(toCandidatePayload(await candidateService.getCandidate(parsed.data)));
    } catch (error) {
      next(error);
    }
  });

  router.get("/:candidateId/resume", async (req, res, next) => {
    const parsed = candidateIdSchema.safeParse(req.params.candidateId);

    if (!parsed.success) {
      res.status(400).json({
        error: "ValidationError",
        message: parsed.error.flatten()
      });
      return;
    }

    try {
      const resume = await candidateService.getResume(parsed.data);
      res.attachment(resume.filename);
      res.send(resume.bytes);
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:candidateId", async (req, res, next) => {
    const parsed = candidateIdSchema.safeParse(req.params.candidateId);

    if (!parsed.success) {
      res.status(400).json({
        error: "ValidationError",
        message: parsed.error.flatten()
      });
      return;
    }

    try {
      const result = await candidateService.deleteCandidate(parsed.data);
      res.json({
        detail: "deleted successfully",
        warning: result.warning,
        cleanupJobId: result.cleanupJobId
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
