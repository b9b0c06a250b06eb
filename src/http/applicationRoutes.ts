import { Request, Response, Router } from "express";
import { z } from "zod";
import { DocumentType, languages } from "../domain/model";
import { requirePermission } from "../domain/permissions";
import { parsePhase1Decision, parsePhase2Decision, parseWorkflowPhase } from "../domain/workflow";
import { ApplicationService } from "../services/applicationService";
import { DecisionOutcome, RegenerationOutcome, WorkflowService } from "../services/workflowService";
import { authOf } from "./auth";

const optionalText = z.string().max(2000).optional();

const candidateSchema = z.object({
  firstName: z.string().trim().min(1),
  lastName: z.string().trim().min(1),
  email: z.string().trim().email(),
  phone: z.string().trim().min(3),
  address: z.string().trim().min(1),
  country: z.string().optional(),
  region: z.string().optional(),
  gender: z.string().optional(),
  birthPlace: z.string().optional(),
  birthDate: z.string().optional(),
  nationality: z.string().optional(),
  maritalStatus: z.string().optional(),
  educationLevel: z.string().optional(),
  specialization: z.string().optional(),
  languages: z.record(z.string()).optional()
});

const submitApplicationSchema = z.object({
  jobId: z.number().int().positive().optional(),
  jobTitle: z.string().max(200).optional(),
  candidate: candidateSchema,
  staffNotes: optionalText
});

const phase1DecisionSchema = z.object({
  decision: z.string().min(1),
  interviewDate: z.string().optional(),
  rejectionReason: optionalText,
  selectedJobTitle: z.string().max(200).optional()
});

const phase2DecisionSchema = z.object({
  decision: z.string().min(1),
  workStartDate: z.string().optional(),
  rejectionReason: optionalText,
  interviewNotes: optionalText
});

// Queue job ids; an all-digit id would be taken for an integer.
const issueJobSchema = z.object({
  requestId: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,100}$/)
    .regex(/[^0-9]/, "requestId needs at least one non-digit character")
});

const applicationIdSchema = z.coerce.number().int().positive();

const documentTypeSchema = z
  .enum(["interview-invitation", "acceptance-letter"])
  .transform((value): DocumentType => (value === "interview-invitation" ? "convocation" : "acceptation"));

const languageSchema = z.enum(languages);

const sendValidationError = (res: Response, error: z.ZodError): void => {
  res.status(400).json({
    error: "ValidationError",
    message: error.flatten()
  });
};

const presentIssuance = (outcome: Pick<DecisionOutcome, "issuance">) =>
  outcome.issuance
    ? {
        documentType: outcome.issuance.documentType,
        verificationCode: outcome.issuance.record?.verificationCode,
        languages: outcome.issuance.record?.languages ?? []
      }
    : undefined;

const presentDecision = (outcome: DecisionOutcome) => ({
  application: outcome.application,
  transition: outcome.transition,
  documents: presentIssuance(outcome),
  documentWarnings: outcome.documentWarnings,
  notification: outcome.notification
});

const presentRegeneration = (outcome: RegenerationOutcome) => ({
  application: outcome.application,
  documents: presentIssuance(outcome),
  documentWarnings: outcome.documentWarnings
});

/** Parses `:applicationId`; answers 400 itself and returns undefined when it is not a positive integer. */
const applicationIdOf = (req: Request, res: Response): number | undefined => {
  const parsed = applicationIdSchema.safeParse(req.params.applicationId);
  if (!parsed.success) {
    sendValidationError(res, parsed.error);
    return undefined;
  }

  return parsed.data;
};

export const buildIntakeRoutes = (applicationService: ApplicationService): Router => {
  const router = Router();

  router.post("/applications", async (req, res, next) => {
    const parsed = submitApplicationSchema.safeParse(req.body);

    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const application = await applicationService.submit(parsed.data);
      res.status(201).json({ id: application.id, status: application.status, submittedAt: application.submittedAt });
    } catch (error) {
      next(error);
    }
  });

  return router;
};

export const buildApplicationRoutes = (
  applicationService: ApplicationService,
  workflowService: WorkflowService
): Router => {
  const router = Router();

  router.post("/", async (req, res, next) => {
    const parsed = submitApplicationSchema.safeParse(req.body);

    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      requirePermission(authOf(req), "edit_application");
      const application = await applicationService.submit(parsed.data);
      res.status(201).json(application);
    } catch (error) {
      next(error);
    }
  });

  router.get("/document-jobs/:jobId", async (req, res, next) => {
    try {
      res.json(await workflowService.getDocumentJob(authOf(req), req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  router.get("/:applicationId", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    try {
      res.json(await applicationService.get(authOf(req), applicationId));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:applicationId", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    try {
      res.json(await applicationService.delete(authOf(req), applicationId));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:applicationId/phase1-decision", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    const parsed = phase1DecisionSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const outcome = await workflowService.decidePhase1(authOf(req), applicationId, {
        ...parsed.data,
        decision: parsePhase1Decision(parsed.data.decision)
      });
      res.json(presentDecision(outcome));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:applicationId/phase2-decision", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    const parsed = phase2DecisionSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const outcome = await workflowService.decidePhase2(authOf(req), applicationId, {
        ...parsed.data,
        decision: parsePhase2Decision(parsed.data.decision)
      });
      res.json(presentDecision(outcome));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:applicationId/notifications/:phase/sent", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    try {
      const phase = parseWorkflowPhase(Number(req.params.phase));
      const application = await workflowService.markNotificationSent(authOf(req), applicationId, phase);
      res.json({ id: application.id, notifications: application.notifications });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:applicationId/documents/:documentType/regenerate", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    const documentType = documentTypeSchema.safeParse(req.params.documentType);
    if (!documentType.success) {
      sendValidationError(res, documentType.error);
      return;
    }

    try {
      const outcome = await workflowService.regenerateDocument(authOf(req), applicationId, documentType.data);
      res.status(201).json(presentRegeneration(outcome));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:applicationId/documents/:documentType/issue-jobs", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    const documentType = documentTypeSchema.safeParse(req.params.documentType);
    const body = issueJobSchema.safeParse(req.body);
    if (!documentType.success) {
      sendValidationError(res, documentType.error);
      return;
    }

    if (!body.success) {
      sendValidationError(res, body.error);
      return;
    }

    try {
      const job = await workflowService.enqueueDocumentIssuance(
        authOf(req),
        applicationId,
        documentType.data,
        body.data.requestId
      );
      res.status(202).json(job);
    } catch (error) {
      next(error);
    }
  });

  router.get("/:applicationId/documents/:documentType/:language", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    const documentType = documentTypeSchema.safeParse(req.params.documentType);
    const language = languageSchema.safeParse(req.params.language);
    if (!documentType.success) {
      sendValidationError(res, documentType.error);
      return;
    }

    if (!language.success) {
      sendValidationError(res, language.error);
      return;
    }

    try {
      const document = await workflowService.getDocument(authOf(req), applicationId, documentType.data, language.data);
      res.attachment(document.fileName);
      res.type("application/pdf");
      res.send(document.content);
    } catch (error) {
      next(error);
    }
  });

  router.get("/:applicationId/verifications", async (req, res, next) => {
    const applicationId = applicationIdOf(req, res);
    if (applicationId === undefined) {
      return;
    }

    try {
      res.json({ items: await workflowService.listVerificationRecords(authOf(req), applicationId) });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
