import { VerificationRecord } from "../domain/model";
import { DuplicateVerificationCodeError, VerificationLedger } from "./verificationLedger";

export class InMemoryVerificationLedger implements VerificationLedger {
  private readonly store = new Map<string, VerificationRecord>();

  async record(entry: VerificationRecord): Promise<void> {
    if (this.store.has(entry.verificationCode)) {
      throw new DuplicateVerificationCodeError(entry.verificationCode);
    }

    this.store.set(entry.verificationCode, structuredClone(entry));
  }

  async exists(verificationCode: string): Promise<boolean> {
    return this.store.has(verificationCode);
  }

  async findByCode(verificationCode: string): Promise<VerificationRecord | undefined> {
    const entry = this.store.get(verificationCode);
    return entry ? structuredClone(entry) : undefined;
  }

  async listByApplication(applicationId: number): Promise<VerificationRecord[]> {
    return [...this.store.values()]
      .filter((entry) => entry.applicationId === applicationId)
      .map((entry) => structuredClone(entry));
  }

  async revoke(verificationCode: string): Promise<VerificationRecord | undefined> {
    const entry = this.store.get(verificationCode);
    if (!entry) {
      return undefined;
    }

    entry.status = "revoquee";
    return structuredClone(entry);
  }

  async deleteByApplication(applicationId: number): Promise<number> {
    let removed = 0;
    for (const [code, entry] of this.store) {
      if (entry.applicationId === applicationId) {
        this.store.delete(code);
        removed += 1;
      }
    }

    return removed;
  }
}
