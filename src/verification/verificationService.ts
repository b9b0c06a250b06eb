import { VerificationRecord } from "../domain/model";
import { getLogger } from "../infra/logger";
import { VerificationLedger } from "../repositories/verificationLedger";
import { isWellFormedVerificationCode, normalizeVerificationCode } from "./codeGenerator";

export type VerificationLookup =
  | { found: true; record: VerificationRecord }
  | { found: false; verificationCode: string };

const logger = getLogger({ module: "verification" });

/** Pulls the code out of a verification URL such as the one encoded in a document's QR code. */
export const extractVerificationCode = (url: string): string | undefined => {
  const match = /\/verify\/([^/?#]+)/.exec(url);
  return match ? normalizeVerificationCode(decodeURIComponent(match[1])) : undefined;
};

export class VerificationService {
  constructor(private readonly ledger: VerificationLedger) {}

  async lookup(rawCode: string): Promise<VerificationLookup> {
    const verificationCode = normalizeVerificationCode(rawCode);
    if (!isWellFormedVerificationCode(verificationCode)) {
      return { found: false, verificationCode };
    }

    try {
      const record = await this.ledger.findByCode(verificationCode);
      return record ? { found: true, record } : { found: false, verificationCode };
    } catch (error) {
      logger.error({ verificationCode, err: error }, "verification_lookup_failed");
      return { found: false, verificationCode };
    }
  }
}
