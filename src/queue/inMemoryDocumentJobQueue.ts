import { NotFoundError } from "../domain/errors";
import { DocumentJobPayload, DocumentJobProcessor, DocumentJobQueue, DocumentJobSnapshot } from "./types";

export class InMemoryDocumentJobQueue implements DocumentJobQueue {
  private readonly jobs = new Map<string, DocumentJobSnapshot>();
  private readonly processor: DocumentJobProcessor;

  constructor(processor: DocumentJobProcessor) {
    this.processor = processor;
  }

  async enqueue(requestId: string, payload: DocumentJobPayload): Promise<DocumentJobSnapshot> {
    const existing = this.jobs.get(requestId);
    if (existing) {
      return { ...existing };
    }

    const now = new Date().toISOString();
    const job: DocumentJobSnapshot = {
      id: requestId,
      status: "QUEUED",
      applicationId: payload.applicationId,
      documentType: payload.documentType,
      createdAt: now,
      updatedAt: now
    };

    this.jobs.set(job.id, job);

    setTimeout(() => {
      void this.run(job.id, payload);
    }, 0);

    return { ...job };
  }

  async getJob(jobId: string): Promise<DocumentJobSnapshot> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(`Document job ${jobId} was not found.`);
    }

    return { ...job };
  }

  private async run(jobId: string, payload: DocumentJobPayload): Promise<void> {
    const running = this.jobs.get(jobId);
    if (!running) {
      return;
    }

    running.status = "RUNNING";
    running.updatedAt = new Date().toISOString();

    try {
      await this.processor(payload);
      running.status = "COMPLETED";
    } catch (error) {
      running.status = "FAILED";
      running.error = error instanceof Error ? error.message : "Unknown job error";
    }

    running.updatedAt = new Date().toISOString();
  }
}
