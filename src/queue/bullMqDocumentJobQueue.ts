import { Job, Queue, Worker } from "bullmq";
import IORedis from "ioredis";
import { NotFoundError } from "../domain/errors";
import { getLogger } from "../infra/logger";
import { DocumentJobPayload, DocumentJobProcessor, DocumentJobQueue, DocumentJobSnapshot } from "./types";

interface BullMqDocumentJobQueueOptions {
  redisUrl: string;
  processor: DocumentJobProcessor;
}

const queueName = "document_issuance";
const logger = getLogger({ module: "document-queue" });

export class BullMqDocumentJobQueue implements DocumentJobQueue {
  private readonly connection: IORedis;
  private readonly queue: Queue<DocumentJobPayload>;
  private readonly worker: Worker<DocumentJobPayload>;

  constructor(options: BullMqDocumentJobQueueOptions) {
    this.connection = new IORedis(options.redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false
    });

    this.queue = new Queue(queueName, { connection: this.connection });
    this.worker = new Worker(
      queueName,
      async (job: Job<DocumentJobPayload>) => {
        await options.processor(job.data);
      },
      { connection: this.connection }
    );

    this.worker.on("failed", (job, error) => {
      logger.error({ jobId: job?.id, applicationId: job?.data.applicationId, err: error }, "document_job_failed");
    });
  }

  async enqueue(requestId: string, payload: DocumentJobPayload): Promise<DocumentJobSnapshot> {
    // BullMQ ignores an add whose jobId already exists, so a repeated request id is a no-op.
    await this.queue.add("issue-document", payload, {
      jobId: requestId,
      attempts: 3,
      backoff: { type: "exponential", delay: 1000 },
      removeOnComplete: 1000,
      removeOnFail: 1000
    });

    return this.getJob(requestId);
  }

  async getJob(jobId: string): Promise<DocumentJobSnapshot> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Document job ${jobId} was not found.`);
    }

    const state = await job.getState();
    const now = new Date().toISOString();

    return {
      id: String(job.id ?? jobId),
      status: this.mapState(state),
      applicationId: job.data.applicationId,
      documentType: job.data.documentType,
      createdAt: job.timestamp ? new Date(job.timestamp).toISOString() : now,
      updatedAt: job.finishedOn ? new Date(job.finishedOn).toISOString() : now,
      error: job.failedReason || undefined
    };
  }

  async close(): Promise<void> {
    await this.worker.close();
    await this.queue.close();
    await this.connection.quit();
  }

  private mapState(state: string): DocumentJobSnapshot["status"] {
    if (state === "waiting" || state === "delayed" || state === "prioritized" || state === "waiting-children") {
      return "QUEUED";
    }

    if (state === "active") {
      return "RUNNING";
    }

    if (state === "completed") {
      return "COMPLETED";
    }

    if (state === "failed") {
      return "FAILED";
    }

    return "UNKNOWN";
  }
}
