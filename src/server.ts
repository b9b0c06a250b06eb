import { createApp } from "./app";
import { config } from "./config";
import { DocumentIssuer } from "./documents/documentIssuer";
import { PdfKitDocumentRenderer } from "./documents/pdfRenderer";
import { LocalDocumentStorage } from "./documents/storage";
import { RoleTablePermissionOracle } from "./domain/permissions";
import { getLogger } from "./infra/logger";
import { createPostgresPool } from "./infra/postgres";
import { NotificationComposer } from "./notifications/notificationComposer";
import { BullMqDocumentJobQueue } from "./queue/bullMqDocumentJobQueue";
import { InMemoryDocumentJobQueue } from "./queue/inMemoryDocumentJobQueue";
import { DocumentJobPayload } from "./queue/types";
import { ApplicationRepository } from "./repositories/applicationRepository";
import { InMemoryApplicationRepository } from "./repositories/inMemoryApplicationRepository";
import { InMemoryVerificationLedger } from "./repositories/inMemoryVerificationLedger";
import { InMemoryJobCatalog, JobCatalog, PostgresJobCatalog } from "./repositories/jobCatalog";
import { PostgresApplicationRepository } from "./repositories/postgresApplicationRepository";
import { PostgresVerificationLedger } from "./repositories/postgresVerificationLedger";
import { VerificationLedger } from "./repositories/verificationLedger";
import { ApplicationService } from "./services/applicationService";
import { KeyedMutex } from "./services/keyedMutex";
import { WorkflowService } from "./services/workflowService";
import { VerificationCodeFactory } from "./verification/codeGenerator";
import { VerificationService } from "./verification/verificationService";

const logger = getLogger({ module: "server" });

const bootstrap = async (): Promise<void> => {
  const pool = config.databaseUrl ? createPostgresPool(config.databaseUrl) : undefined;

  const jobCatalog: JobCatalog = pool ? new PostgresJobCatalog(pool) : new InMemoryJobCatalog();
  const applicationRepository: ApplicationRepository = pool
    ? new PostgresApplicationRepository(pool)
    : new InMemoryApplicationRepository();
  const ledger: VerificationLedger = pool ? new PostgresVerificationLedger(pool) : new InMemoryVerificationLedger();

  // Order matters: the ledger references applications.
  for (const store of [jobCatalog, applicationRepository, ledger]) {
    if (store.init) {
      await store.init();
    }
  }

  const storage = new LocalDocumentStorage(config.documents.dir);
  const issuer = new DocumentIssuer(
    new VerificationCodeFactory(ledger),
    ledger,
    new PdfKitDocumentRenderer({
      arabicFontPath: config.documents.arabicFontPath || undefined,
      arabicBoldFontPath: config.documents.arabicBoldFontPath || undefined
    }),
    storage,
    {
      baseUrl: config.publicBaseUrl,
      timeZone: config.documents.timeZone,
      organization: config.organization,
      languages: config.documents.languages
    }
  );

  const mutex = new KeyedMutex();
  const applicationService = new ApplicationService(applicationRepository, jobCatalog, ledger, storage, mutex);
  const workflowService = new WorkflowService(
    applicationRepository,
    ledger,
    issuer,
    storage,
    new NotificationComposer({
      organizationName: config.organization.name,
      whatsappCountryCode: config.whatsappCountryCode
    }),
    mutex
  );

  const processor = async (payload: DocumentJobPayload) => {
    await workflowService.processDocumentJob(payload);
  };
  const queue = config.redisUrl
    ? new BullMqDocumentJobQueue({ redisUrl: config.redisUrl, processor })
    : new InMemoryDocumentJobQueue(processor);

  workflowService.setJobQueue(queue);

  const app = createApp({
    applicationService,
    workflowService,
    verificationService: new VerificationService(ledger),
    permissionOracle: new RoleTablePermissionOracle(),
    internalApiKey: config.internalApiKey
  });

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        repository: pool ? "postgres" : "in-memory",
        queue: config.redisUrl ? "bullmq" : "in-memory",
        languages: config.documents.languages
      },
      "server_started"
    );
  });
};

bootstrap().catch((error) => {
  logger.fatal({ err: error }, "bootstrap_failed");
  process.exit(1);
});
