import { OrganizationProfile } from "../config";
import { DocumentGenerationError, InvalidTransitionError, MissingRequiredFieldError } from "../domain/errors";
import {
  Application,
  candidateFullName,
  DocumentType,
  effectiveJobTitle,
  Language,
  LanguageArtifacts,
  VerificationRecord
} from "../domain/model";
import { phase2Of, selectedPhase1 } from "../domain/workflow";
import { getLogger, Logger } from "../infra/logger";
import { DuplicateVerificationCodeError, VerificationLedger } from "../repositories/verificationLedger";
import { VerificationCodeFactory } from "../verification/codeGenerator";
import { formatIssueDate } from "./dates";
import { buildDocumentStorageKey } from "./fileNames";
import { buildDocumentLayout } from "./layout";
import { DocumentRenderer } from "./pdfRenderer";
import { DocumentStorage } from "./storage";

export interface DocumentIssuerOptions {
  baseUrl: string;
  timeZone: string;
  organization: OrganizationProfile;
  languages: Language[];
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Outcome of one issuance event. Language variants share the verification code;
 * `record` is absent when no variant could be stored.
 */
export interface IssuanceResult {
  documentType: DocumentType;
  artifacts: LanguageArtifacts;
  failures: DocumentGenerationError[];
  record?: VerificationRecord;
}

interface IssueRequest {
  documentType: DocumentType;
  application: Application;
  languages: Language[];
  interviewDate?: string;
  workStartDate?: string;
}

const MAX_RECORD_ATTEMPTS = 3;

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class DocumentIssuer {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly codes: VerificationCodeFactory,
    private readonly ledger: VerificationLedger,
    private readonly renderer: DocumentRenderer,
    private readonly storage: DocumentStorage,
    private readonly options: DocumentIssuerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger({ module: "document-issuer" });
  }

  async issueInterviewInvitation(application: Application, languages = this.options.languages): Promise<IssuanceResult> {
    const phase1 = selectedPhase1(application.workflow);
    if (!phase1) {
      throw new InvalidTransitionError(
        `Application ${application.id} must be selected for interview before an invitation is issued.`
      );
    }

    if (!phase1.interviewDate) {
      throw new MissingRequiredFieldError("interviewDate");
    }

    return this.issue({
      documentType: "convocation",
      application,
      languages,
      interviewDate: phase1.interviewDate
    });
  }

  async issueAcceptanceLetter(application: Application, languages = this.options.languages): Promise<IssuanceResult> {
    const phase2 = phase2Of(application.workflow);
    if (phase2?.status !== "accepted") {
      throw new InvalidTransitionError(
        `Application ${application.id} must be accepted in phase 2 before an acceptance letter is issued.`
      );
    }

    return this.issue({
      documentType: "acceptation",
      application,
      languages,
      workStartDate: phase2.workStartDate
    });
  }

  private async issue(request: IssueRequest): Promise<IssuanceResult> {
    const { application, documentType } = request;

    for (let attempt = 1; ; attempt += 1) {
      const verificationCode = await this.codes.next(application.id, documentType);
      const result = await this.issueWithCode(request, verificationCode);
      if (result) {
        return result;
      }

      if (attempt >= MAX_RECORD_ATTEMPTS) {
        throw new DocumentGenerationError(
          documentType,
          undefined,
          `Documents for application ${application.id} could not be recorded: every verification code collided.`
        );
      }
    }
  }

  /** Returns undefined when the code was taken between generation and the ledger insert. */
  private async issueWithCode(request: IssueRequest, verificationCode: string): Promise<IssuanceResult | undefined> {
    const { application, documentType } = request;
    const issuedAt = this.clock();
    const issueDate = formatIssueDate(issuedAt, this.options.timeZone);
    const artifacts: LanguageArtifacts = {};
    const failures: DocumentGenerationError[] = [];

    for (const language of request.languages) {
      try {
        const layout = buildDocumentLayout({
          documentType,
          application,
          language,
          verificationCode,
          baseUrl: this.options.baseUrl,
          issueDate,
          organization: this.options.organization,
          interviewDate: request.interviewDate,
          workStartDate: request.workStartDate
        });
        const content = await this.renderer.render(layout);
        const key = buildDocumentStorageKey({
          documentType,
          candidate: application.candidate,
          applicationId: application.id,
          issuedAt,
          timeZone: this.options.timeZone,
          language,
          verificationCode
        });

        await this.storage.put(key, content);
        artifacts[language] = key;
      } catch (error) {
        const failure = new DocumentGenerationError(
          documentType,
          language,
          `Could not generate the ${language} ${documentType} for application ${application.id}: ${describe(error)}`,
          { cause: error }
        );
        this.logger.error(
          { applicationId: application.id, documentType, language, err: error },
          "document_render_failed"
        );
        failures.push(failure);
      }
    }

    const storedLanguages = request.languages.filter((language) => artifacts[language] !== undefined);
    const pdfPath = storedLanguages.length > 0 ? artifacts[storedLanguages[0]] : undefined;
    if (!pdfPath) {
      return { documentType, artifacts, failures };
    }

    // Written last so the ledger never points at an artifact that was not stored.
    const record: VerificationRecord = {
      verificationCode,
      applicationId: application.id,
      documentType,
      candidateName: candidateFullName(application),
      jobTitle: effectiveJobTitle(application),
      issueDate,
      pdfPath,
      languages: storedLanguages,
      artifacts: { ...artifacts },
      status: "valide",
      createdAt: issuedAt.toISOString()
    };

    try {
      await this.ledger.record(record);
    } catch (error) {
      if (error instanceof DuplicateVerificationCodeError) {
        this.logger.warn({ applicationId: application.id, documentType, verificationCode }, "verification_code_collision");
        await this.discard(artifacts);
        return undefined;
      }

      this.logger.error(
        { applicationId: application.id, documentType, verificationCode, err: error },
        "verification_record_failed"
      );
      throw new DocumentGenerationError(
        documentType,
        undefined,
        `Documents for application ${application.id} were stored but the verification record could not be saved: ${describe(error)}`,
        { cause: error }
      );
    }

    this.logger.info(
      { applicationId: application.id, documentType, verificationCode, languages: storedLanguages },
      "document_issued"
    );

    return { documentType, artifacts, failures, record };
  }

  // The files carry a code that belongs to another record.
  private async discard(artifacts: LanguageArtifacts): Promise<void> {
    for (const key of Object.values(artifacts)) {
      if (key) {
        await this.storage.remove(key);
      }
    }
  }
}
