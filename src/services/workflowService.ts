import { DocumentIssuer, IssuanceResult } from "../documents/documentIssuer";
import { fileNameOf } from "../documents/fileNames";
import { DocumentStorage } from "../documents/storage";
import { ConcurrentModificationError, DocumentGenerationError, NotFoundError } from "../domain/errors";
import { HttpError } from "../http/httpError";
import {
  Application,
  ApplicationTarget,
  documentSlot,
  DocumentType,
  Language,
  VerificationRecord
} from "../domain/model";
import { AuthorizationContext, requirePermission } from "../domain/permissions";
import {
  applyPhase1Decision,
  applyPhase2Decision,
  currentRejectionReason,
  deriveStatusLabel,
  Phase1DecisionInput,
  Phase2DecisionInput,
  WorkflowPhase,
  WorkflowTransition
} from "../domain/workflow";
import { getLogger, Logger } from "../infra/logger";
import { NotificationComposer, NotificationDraft } from "../notifications/notificationComposer";
import { DocumentJobPayload, DocumentJobQueue, DocumentJobSnapshot } from "../queue/types";
import { ApplicationRepository } from "../repositories/applicationRepository";
import { VerificationLedger } from "../repositories/verificationLedger";
import { KeyedMutex } from "./keyedMutex";

export interface DocumentWarning {
  documentType: DocumentType;
  language?: Language;
  error: string;
  message: string;
}

export interface DecisionOutcome {
  application: Application;
  transition: WorkflowTransition;
  issuance?: IssuanceResult;
  documentWarnings: DocumentWarning[];
  notification: NotificationDraft;
}

export interface RegenerationOutcome {
  application: Application;
  issuance: IssuanceResult;
  documentWarnings: DocumentWarning[];
}

export interface Phase1DecisionRequest extends Phase1DecisionInput {
  selectedJobTitle?: string;
}

export interface Phase2DecisionRequest extends Phase2DecisionInput {
  interviewNotes?: string;
}

export interface StoredDocument {
  fileName: string;
  content: Buffer;
}

interface IssuanceAttempt {
  application: Application;
  issuance?: IssuanceResult;
  documentWarnings: DocumentWarning[];
}

const toWarning = (documentType: DocumentType, error: unknown): DocumentWarning => {
  if (error instanceof DocumentGenerationError) {
    return { documentType, language: error.language, error: error.name, message: error.message };
  }

  if (error instanceof Error) {
    return { documentType, error: error.name, message: error.message };
  }

  return { documentType, error: "Error", message: String(error) };
};

const withSelectedJobTitle = (target: ApplicationTarget, selectedJobTitle?: string): ApplicationTarget => {
  const title = selectedJobTitle?.trim();
  return target.kind === "spontaneous" && title ? { ...target, selectedJobTitle: title } : target;
};

export class WorkflowService {
  private jobQueue: DocumentJobQueue | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly repository: ApplicationRepository,
    private readonly ledger: VerificationLedger,
    private readonly issuer: DocumentIssuer,
    private readonly storage: DocumentStorage,
    private readonly notifications: NotificationComposer,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
    private readonly clock: () => Date = () => new Date()
  ) {
    this.logger = getLogger({ module: "workflow" });
  }

  setJobQueue(queue: DocumentJobQueue): void {
    this.jobQueue = queue;
  }

  async decidePhase1(
    auth: AuthorizationContext,
    applicationId: number,
    input: Phase1DecisionRequest
  ): Promise<DecisionOutcome> {
    requirePermission(auth, "edit_application");

    return this.mutex.run(String(applicationId), async () => {
      const current = await this.load(applicationId);
      const workflow = applyPhase1Decision(current.workflow, input, this.clock().toISOString());
      const committed = await this.repository.save(
        {
          ...current,
          target: withSelectedJobTitle(current.target, input.selectedJobTitle),
          workflow,
          status: deriveStatusLabel(workflow)
        },
        current.version
      );
      const transition: WorkflowTransition = { phase: 1, decision: input.decision };
      this.logger.info({ applicationId, actorId: auth.actorId, transition }, "workflow_transition_committed");

      const attempt: IssuanceAttempt =
        input.decision === "selected_for_interview"
          ? await this.issueAfterTransition(committed, "convocation")
          : { application: committed, documentWarnings: [] };

      return {
        ...attempt,
        transition,
        notification: this.notifications.compose(attempt.application, {
          phase: 1,
          decision: input.decision,
          interviewDate: input.interviewDate,
          rejectionReason: currentRejectionReason(workflow),
          hasDocument: attempt.issuance?.record !== undefined
        })
      };
    });
  }

  async decidePhase2(
    auth: AuthorizationContext,
    applicationId: number,
    input: Phase2DecisionRequest
  ): Promise<DecisionOutcome> {
    requirePermission(auth, "edit_application");

    return this.mutex.run(String(applicationId), async () => {
      const current = await this.load(applicationId);
      const workflow = applyPhase2Decision(current.workflow, input, this.clock().toISOString());
      const interviewNotes = input.interviewNotes?.trim();
      const committed = await this.repository.save(
        {
          ...current,
          workflow,
          interviewNotes: interviewNotes || current.interviewNotes,
          status: deriveStatusLabel(workflow)
        },
        current.version
      );
      const transition: WorkflowTransition = { phase: 2, decision: input.decision };
      this.logger.info({ applicationId, actorId: auth.actorId, transition }, "workflow_transition_committed");

      const attempt: IssuanceAttempt =
        input.decision === "accepted"
          ? await this.issueAfterTransition(committed, "acceptation")
          : { application: committed, documentWarnings: [] };

      return {
        ...attempt,
        transition,
        notification: this.notifications.compose(attempt.application, {
          phase: 2,
          decision: input.decision,
          rejectionReason: currentRejectionReason(workflow),
          hasDocument: attempt.issuance?.record !== undefined
        })
      };
    });
  }

  async markNotificationSent(
    auth: AuthorizationContext,
    applicationId: number,
    phase: WorkflowPhase
  ): Promise<Application> {
    requirePermission(auth, "edit_application");

    return this.mutex.run(String(applicationId), async () => {
      const current = await this.load(applicationId);
      const notifications =
        phase === 1 ? { ...current.notifications, phase1Sent: true } : { ...current.notifications, phase2Sent: true };

      return this.repository.save({ ...current, notifications }, current.version);
    });
  }

  async regenerateDocument(
    auth: AuthorizationContext,
    applicationId: number,
    documentType: DocumentType
  ): Promise<RegenerationOutcome> {
    requirePermission(auth, "edit_application");
    return this.reissue(applicationId, documentType);
  }

  async enqueueDocumentIssuance(
    auth: AuthorizationContext,
    applicationId: number,
    documentType: DocumentType,
    requestId: string
  ): Promise<DocumentJobSnapshot> {
    requirePermission(auth, "edit_application");
    await this.load(applicationId);

    return this.requireQueue().enqueue(requestId, { applicationId, documentType, actorId: auth.actorId });
  }

  async getDocumentJob(auth: AuthorizationContext, jobId: string): Promise<DocumentJobSnapshot> {
    requirePermission(auth, "view_applications");
    return this.requireQueue().getJob(jobId);
  }

  // Queue worker entry point; permission was checked when the job was enqueued.
  async processDocumentJob(payload: DocumentJobPayload): Promise<void> {
    const outcome = await this.reissue(payload.applicationId, payload.documentType);
    this.logger.info(
      {
        applicationId: payload.applicationId,
        actorId: payload.actorId,
        documentType: payload.documentType,
        verificationCode: outcome.issuance.record?.verificationCode
      },
      "document_job_completed"
    );
  }

  async getDocument(
    auth: AuthorizationContext,
    applicationId: number,
    documentType: DocumentType,
    language: Language
  ): Promise<StoredDocument> {
    requirePermission(auth, "view_applications");
    const application = await this.load(applicationId);
    const key = application.documents[documentSlot(documentType)][language];
    const content = key ? await this.storage.get(key) : undefined;

    if (!key || !content) {
      throw new NotFoundError(`No ${language} ${documentType} is stored for application ${applicationId}.`);
    }

    return { fileName: fileNameOf(key), content };
  }

  async listVerificationRecords(auth: AuthorizationContext, applicationId: number): Promise<VerificationRecord[]> {
    requirePermission(auth, "view_applications");
    await this.load(applicationId);
    return this.ledger.listByApplication(applicationId);
  }

  private async reissue(applicationId: number, documentType: DocumentType): Promise<RegenerationOutcome> {
    return this.mutex.run(String(applicationId), async () => {
      const current = await this.load(applicationId);
      const issuance = await this.issue(current, documentType);

      if (!issuance.record) {
        const [first] = issuance.failures;
        throw (
          first ??
          new DocumentGenerationError(documentType, undefined, `No ${documentType} could be generated for application ${applicationId}.`)
        );
      }

      const application = await this.attachArtifacts(current, issuance);
      return { application, issuance, documentWarnings: issuance.failures.map((failure) => toWarning(documentType, failure)) };
    });
  }

  /** Second step of a decision: issuance failures become warnings, the committed transition stands. */
  private async issueAfterTransition(application: Application, documentType: DocumentType): Promise<IssuanceAttempt> {
    try {
      const issuance = await this.issue(application, documentType);
      const documentWarnings = issuance.failures.map((failure) => toWarning(documentType, failure));
      if (!issuance.record) {
        return { application, issuance, documentWarnings };
      }

      return { application: await this.attachArtifacts(application, issuance), issuance, documentWarnings };
    } catch (error) {
      this.logger.error({ applicationId: application.id, documentType, err: error }, "document_issuance_failed");
      return { application, documentWarnings: [toWarning(documentType, error)] };
    }
  }

  private issue(application: Application, documentType: DocumentType): Promise<IssuanceResult> {
    return documentType === "convocation"
      ? this.issuer.issueInterviewInvitation(application)
      : this.issuer.issueAcceptanceLetter(application);
  }

  private async attachArtifacts(application: Application, issuance: IssuanceResult): Promise<Application> {
    const slot = documentSlot(issuance.documentType);
    let current = application;

    // One reload covers a write that landed from another process between the two steps.
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        return await this.repository.save(
          { ...current, documents: { ...current.documents, [slot]: { ...issuance.artifacts } } },
          current.version
        );
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError) || attempt > 0) {
          throw error;
        }

        current = await this.load(application.id);
      }
    }

    throw new ConcurrentModificationError(application.id);
  }

  private async load(applicationId: number): Promise<Application> {
    const application = await this.repository.findById(applicationId);
    if (!application) {
      throw new NotFoundError(`Application ${applicationId} was not found.`);
    }

    return application;
  }

  private requireQueue(): DocumentJobQueue {
    if (!this.jobQueue) {
      throw new HttpError(503, "Document job queue is not configured.");
    }

    return this.jobQueue;
  }
}
