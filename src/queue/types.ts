import { DocumentType } from "../domain/model";

export type DocumentJobStatus = "QUEUED" | "RUNNING" | "COMPLETED" | "FAILED" | "UNKNOWN";

export interface DocumentJobPayload {
  applicationId: number;
  documentType: DocumentType;
  actorId: string;
}

export interface DocumentJobSnapshot {
  id: string;
  status: DocumentJobStatus;
  applicationId: number;
  documentType: DocumentType;
  createdAt: string;
  updatedAt: string;
  error?: string;
}

export type DocumentJobProcessor = (payload: DocumentJobPayload) => Promise<void>;

/** Issuance retries keyed by the caller's request id; enqueuing the same id twice returns the first job. */
export interface DocumentJobQueue {
  enqueue(requestId: string, payload: DocumentJobPayload): Promise<DocumentJobSnapshot>;
  getJob(jobId: string): Promise<DocumentJobSnapshot>;
  close?(): Promise<void>;
}
