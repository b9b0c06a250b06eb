import { VerificationRecord } from "../domain/model";
import { CodeRegistry } from "../verification/codeGenerator";

export class DuplicateVerificationCodeError extends Error {
  constructor(readonly verificationCode: string) {
    super(`Verification code ${verificationCode} is already recorded.`);
    this.name = "DuplicateVerificationCode";
  }
}

/**
 * Append-only store of issued documents. Records are never edited apart from
 * their status, and are only removed together with their application.
 */
export interface VerificationLedger extends CodeRegistry {
  init?(): Promise<void>;
  /** Throws DuplicateVerificationCodeError when the code is taken. */
  record(entry: VerificationRecord): Promise<void>;
  findByCode(verificationCode: string): Promise<VerificationRecord | undefined>;
  listByApplication(applicationId: number): Promise<VerificationRecord[]>;
  revoke(verificationCode: string): Promise<VerificationRecord | undefined>;
  deleteByApplication(applicationId: number): Promise<number>;
}
