import { Response, Router } from "express";
import { z } from "zod";
import { VerificationLookup, VerificationService } from "../verification/verificationService";

const manualEntrySchema = z.object({
  verificationCode: z.string().min(1).max(64)
});

export const NOT_FOUND_MESSAGE = "Document introuvable ou invalide";

const sendLookup = (res: Response, result: VerificationLookup): void => {
  if (!result.found) {
    res.status(404).json({ valid: false, verificationCode: result.verificationCode, message: NOT_FOUND_MESSAGE });
    return;
  }

  const { record } = result;
  res.json({
    valid: record.status === "valide",
    verificationCode: record.verificationCode,
    documentType: record.documentType,
    candidateName: record.candidateName,
    jobTitle: record.jobTitle,
    issueDate: record.issueDate,
    status: record.status
  });
};

// Public and unauthenticated: a record summary, valid only while not revoked, or "not found".
export const buildVerificationRoutes = (verificationService: VerificationService): Router => {
  const router = Router();

  router.get("/:code", async (req, res, next) => {
    try {
      sendLookup(res, await verificationService.lookup(req.params.code));
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req, res, next) => {
    const parsed = manualEntrySchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: "ValidationError",
        message: parsed.error.flatten()
      });
      return;
    }

    try {
      sendLookup(res, await verificationService.lookup(parsed.data.verificationCode));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
