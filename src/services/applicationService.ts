import { DocumentStorage } from "../documents/storage";
import { CreateApplicationInput } from "../domain/application";
import { NotFoundError } from "../domain/errors";
import { Application, ApplicationTarget, CandidateProfile, LanguageArtifacts } from "../domain/model";
import { AuthorizationContext, requirePermission } from "../domain/permissions";
import { getLogger } from "../infra/logger";
import { ApplicationRepository } from "../repositories/applicationRepository";
import { JobCatalog } from "../repositories/jobCatalog";
import { VerificationLedger } from "../repositories/verificationLedger";
import { KeyedMutex } from "./keyedMutex";

export const SPONTANEOUS_JOB_TITLE = "Candidature spontanée";

export interface SubmitApplicationInput {
  jobId?: number;
  jobTitle?: string;
  candidate: CandidateProfile;
  staffNotes?: string;
}

export interface DeletionSummary {
  applicationId: number;
  removedDocuments: number;
  removedVerificationRecords: number;
}

const logger = getLogger({ module: "applications" });

const storedKeys = (artifacts: LanguageArtifacts): string[] =>
  Object.values(artifacts).filter((key): key is string => typeof key === "string");

export class ApplicationService {
  constructor(
    private readonly repository: ApplicationRepository,
    private readonly jobs: JobCatalog,
    private readonly ledger: VerificationLedger,
    private readonly storage: DocumentStorage,
    private readonly mutex: KeyedMutex = new KeyedMutex()
  ) {}

  async submit(input: SubmitApplicationInput): Promise<Application> {
    const target = await this.resolveTarget(input);
    const payload: CreateApplicationInput = {
      target,
      candidate: input.candidate,
      staffNotes: input.staffNotes?.trim() || undefined
    };

    const application = await this.repository.create(payload);
    logger.info({ applicationId: application.id, target: target.kind }, "application_submitted");
    return application;
  }

  async get(auth: AuthorizationContext, applicationId: number): Promise<Application> {
    requirePermission(auth, "view_applications");
    const application = await this.repository.findById(applicationId);
    if (!application) {
      throw new NotFoundError(`Application ${applicationId} was not found.`);
    }

    return application;
  }

  async delete(auth: AuthorizationContext, applicationId: number): Promise<DeletionSummary> {
    requirePermission(auth, "delete_application");

    return this.mutex.run(String(applicationId), async () => {
      const application = await this.repository.findById(applicationId);
      if (!application) {
        throw new NotFoundError(`Application ${applicationId} was not found.`);
      }

      const records = await this.ledger.listByApplication(applicationId);
      const keys = new Set<string>([
        ...storedKeys(application.documents.interviewInvitation),
        ...storedKeys(application.documents.acceptanceLetter),
        ...records.flatMap((record) => [record.pdfPath, ...storedKeys(record.artifacts)])
      ]);

      for (const key of keys) {
        await this.storage.remove(key);
      }

      const removedVerificationRecords = await this.ledger.deleteByApplication(applicationId);
      await this.repository.delete(applicationId);
      logger.info(
        { applicationId, actorId: auth.actorId, removedDocuments: keys.size, removedVerificationRecords },
        "application_deleted"
      );

      return { applicationId, removedDocuments: keys.size, removedVerificationRecords };
    });
  }

  private async resolveTarget(input: SubmitApplicationInput): Promise<ApplicationTarget> {
    if (input.jobId === undefined) {
      return { kind: "spontaneous", jobTitle: input.jobTitle?.trim() || SPONTANEOUS_JOB_TITLE };
    }

    const job = await this.jobs.findById(input.jobId);
    if (!job) {
      throw new NotFoundError(`Job ${input.jobId} was not found.`);
    }

    return { kind: "job", jobId: job.id, jobTitle: job.title };
  }
}
