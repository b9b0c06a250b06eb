import { createHash, randomBytes } from "crypto";
import { RandomSourceError } from "../domain/errors";
import { DocumentType } from "../domain/model";

export const VERIFICATION_CODE_LENGTH = 16;
const SALT_BYTES = 16;
const MAX_COLLISION_RETRIES = 5;

export type RandomSource = (size: number) => Buffer;

export interface CodeGeneratorDeps {
  random?: RandomSource;
  timestamp?: () => string;
}

const highResolutionTimestamp = (): string => `${new Date().toISOString()}:${process.hrtime.bigint()}`;

/**
 * Builds a 16-character uppercase hex code. The random salt carries the entropy;
 * the id, type and timestamp only make the hashed input unique per issuance.
 */
export const generateVerificationCode = (
  applicationId: number,
  documentType: DocumentType,
  deps: CodeGeneratorDeps = {}
): string => {
  const random = deps.random ?? randomBytes;
  const timestamp = deps.timestamp ?? highResolutionTimestamp;

  let salt: Buffer;
  try {
    salt = random(SALT_BYTES);
  } catch (error) {
    throw new RandomSourceError("Secure random source is unavailable; verification code not generated.", {
      cause: error
    });
  }

  if (salt.length < SALT_BYTES) {
    throw new RandomSourceError(`Secure random source returned ${salt.length} bytes, expected ${SALT_BYTES}.`);
  }

  const data = `${applicationId}-${documentType}-${timestamp()}-${salt.toString("hex")}`;
  return createHash("sha256").update(data).digest("hex").slice(0, VERIFICATION_CODE_LENGTH).toUpperCase();
};

export const normalizeVerificationCode = (raw: string): string => raw.trim().toUpperCase();

export const isWellFormedVerificationCode = (code: string): boolean => /^[0-9A-F]{16}$/.test(code);

export interface CodeRegistry {
  exists(verificationCode: string): Promise<boolean>;
}

export class VerificationCodeFactory {
  constructor(
    private readonly registry: CodeRegistry,
    private readonly generate: typeof generateVerificationCode = generateVerificationCode
  ) {}

  async next(applicationId: number, documentType: DocumentType): Promise<string> {
    for (let attempt = 0; attempt < MAX_COLLISION_RETRIES; attempt += 1) {
      const code = this.generate(applicationId, documentType);
      if (!(await this.registry.exists(code))) {
        return code;
      }
    }

    throw new RandomSourceError(
      `Could not produce an unused verification code after ${MAX_COLLISION_RETRIES} attempts.`
    );
  }
}
