import { DocumentIssuer } from "../src/documents/documentIssuer";
import { DocumentLayout } from "../src/documents/layout";
import { DocumentRenderer } from "../src/documents/pdfRenderer";
import { InMemoryDocumentStorage } from "../src/documents/storage";
import { Application, Language } from "../src/domain/model";
import { AuthorizationContext, RoleTablePermissionOracle, StaffRole } from "../src/domain/permissions";
import { NotificationComposer } from "../src/notifications/notificationComposer";
import { InMemoryDocumentJobQueue } from "../src/queue/inMemoryDocumentJobQueue";
import { InMemoryApplicationRepository } from "../src/repositories/inMemoryApplicationRepository";
import { InMemoryVerificationLedger } from "../src/repositories/inMemoryVerificationLedger";
import { InMemoryJobCatalog } from "../src/repositories/jobCatalog";
import { ApplicationService } from "../src/services/applicationService";
import { KeyedMutex } from "../src/services/keyedMutex";
import { WorkflowService } from "../src/services/workflowService";
import { VerificationCodeFactory } from "../src/verification/codeGenerator";
import { VerificationService } from "../src/verification/verificationService";

export const BASE_URL = "https://jobs.example.test";
export const TIME_ZONE = "Indian/Comoro";
// 11:30:00 on 20/10/2025 in Indian/Comoro (UTC+3).
export const FIXED_NOW = new Date("2025-10-20T08:30:00.000Z");

export const organization = {
  name: "Test Employer",
  nameAr: "جهة التوظيف",
  address: "1 Rue des Tests, Moroni",
  addressAr: "1 شارع الاختبار، موروني",
  phone: "+269 111 22 33",
  email: "rh@test.example"
};

export const candidate = {
  firstName: "Amina",
  lastName: "Said",
  email: "amina.said@example.com",
  phone: "033 12-34 (56)",
  address: "Quartier Test, Moroni"
};

/** Keeps every layout it is asked to render; languages listed in `failFor` throw instead. */
export class RecordingRenderer implements DocumentRenderer {
  readonly layouts: DocumentLayout[] = [];
  readonly failFor = new Set<Language>();

  async render(layout: DocumentLayout): Promise<Buffer> {
    this.layouts.push(layout);
    if (this.failFor.has(layout.language)) {
      throw new Error(`no glyphs for ${layout.language}`);
    }

    return Buffer.from(`%PDF-test ${layout.verificationUrl}`);
  }
}

export const staff = (role: StaffRole = "hr", actorId = "staff-1"): AuthorizationContext => {
  const auth = new RoleTablePermissionOracle().resolve(actorId, role);
  if (!auth) {
    throw new Error(`unknown role ${role}`);
  }

  return auth;
};

export interface Harness {
  repository: InMemoryApplicationRepository;
  ledger: InMemoryVerificationLedger;
  storage: InMemoryDocumentStorage;
  renderer: RecordingRenderer;
  issuer: DocumentIssuer;
  applications: ApplicationService;
  workflow: WorkflowService;
  verification: VerificationService;
  queue: InMemoryDocumentJobQueue;
}

export const createHarness = (options: { firstId?: number; languages?: Language[] } = {}): Harness => {
  const repository = new InMemoryApplicationRepository({ firstId: options.firstId });
  const ledger = new InMemoryVerificationLedger();
  const storage = new InMemoryDocumentStorage();
  const renderer = new RecordingRenderer();
  const issuer = new DocumentIssuer(new VerificationCodeFactory(ledger), ledger, renderer, storage, {
    baseUrl: BASE_URL,
    timeZone: TIME_ZONE,
    organization,
    languages: options.languages ?? ["fr", "ar"],
    clock: () => FIXED_NOW
  });
  const mutex = new KeyedMutex();
  const applications = new ApplicationService(
    repository,
    new InMemoryJobCatalog([{ id: 7, title: "Comptable" }]),
    ledger,
    storage,
    mutex
  );
  const workflow = new WorkflowService(
    repository,
    ledger,
    issuer,
    storage,
    new NotificationComposer({ organizationName: organization.name, whatsappCountryCode: "269" }),
    mutex,
    () => FIXED_NOW
  );
  const queue = new InMemoryDocumentJobQueue((payload) => workflow.processDocumentJob(payload));
  workflow.setJobQueue(queue);

  return {
    repository,
    ledger,
    storage,
    renderer,
    issuer,
    applications,
    workflow,
    verification: new VerificationService(ledger),
    queue
  };
};

export const submitJobApplication = (harness: Harness): Promise<Application> =>
  harness.applications.submit({ jobId: 7, candidate });
