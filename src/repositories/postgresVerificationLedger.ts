import { DatabaseError, Pool } from "pg";
import { DocumentType, Language, LanguageArtifacts, VerificationRecord, VerificationStatus } from "../domain/model";
import { DuplicateVerificationCodeError, VerificationLedger } from "./verificationLedger";

const UNIQUE_VIOLATION = "23505";

interface VerificationRow {
  verification_code: string;
  application_id: number;
  document_type: DocumentType;
  candidate_name: string;
  job_title: string;
  issue_date: string;
  pdf_path: string;
  languages: Language[];
  artifacts: LanguageArtifacts;
  status: VerificationStatus;
  created_at: Date | string;
}

const columns = `
  verification_code, application_id, document_type, candidate_name, job_title,
  issue_date, pdf_path, languages, artifacts, status, created_at
`;

const mapRow = (row: VerificationRow): VerificationRecord => ({
  verificationCode: row.verification_code,
  applicationId: row.application_id,
  documentType: row.document_type,
  candidateName: row.candidate_name,
  jobTitle: row.job_title,
  issueDate: row.issue_date,
  pdfPath: row.pdf_path,
  languages: row.languages,
  artifacts: row.artifacts,
  status: row.status,
  createdAt: new Date(row.created_at).toISOString()
});

export class PostgresVerificationLedger implements VerificationLedger {
  constructor(private readonly pool: Pool) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS verification_records (
        verification_code TEXT PRIMARY KEY,
        application_id INTEGER NOT NULL REFERENCES applications (id) ON DELETE CASCADE,
        document_type TEXT NOT NULL CHECK (document_type IN ('convocation', 'acceptation')),
        candidate_name TEXT NOT NULL,
        job_title TEXT NOT NULL,
        issue_date TEXT NOT NULL,
        pdf_path TEXT NOT NULL,
        languages JSONB NOT NULL,
        artifacts JSONB NOT NULL DEFAULT '{}'::jsonb,
        status TEXT NOT NULL DEFAULT 'valide',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      ALTER TABLE verification_records ADD COLUMN IF NOT EXISTS artifacts JSONB NOT NULL DEFAULT '{}'::jsonb;
      CREATE INDEX IF NOT EXISTS verification_records_application_idx
        ON verification_records (application_id);
    `);
  }

  async record(entry: VerificationRecord): Promise<void> {
    try {
      await this.pool.query(
        `
        INSERT INTO verification_records (${columns})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10, $11)
        `,
        [
          entry.verificationCode,
          entry.applicationId,
          entry.documentType,
          entry.candidateName,
          entry.jobTitle,
          entry.issueDate,
          entry.pdfPath,
          JSON.stringify(entry.languages),
          JSON.stringify(entry.artifacts),
          entry.status,
          entry.createdAt
        ]
      );
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new DuplicateVerificationCodeError(entry.verificationCode);
      }

      throw error;
    }
  }

  async exists(verificationCode: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM verification_records WHERE verification_code = $1", [
      verificationCode
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async findByCode(verificationCode: string): Promise<VerificationRecord | undefined> {
    const { rows } = await this.pool.query<VerificationRow>(
      `
      SELECT ${columns}
      FROM verification_records
      WHERE verification_code = $1
      `,
      [verificationCode]
    );

    if (rows.length === 0) {
      return undefined;
    }

    return mapRow(rows[0]);
  }

  async listByApplication(applicationId: number): Promise<VerificationRecord[]> {
    const { rows } = await this.pool.query<VerificationRow>(
      `
      SELECT ${columns}
      FROM verification_records
      WHERE application_id = $1
      ORDER BY created_at ASC
      `,
      [applicationId]
    );

    return rows.map(mapRow);
  }

  async revoke(verificationCode: string): Promise<VerificationRecord | undefined> {
    const { rows } = await this.pool.query<VerificationRow>(
      `
      UPDATE verification_records
      SET status = 'revoquee'
      WHERE verification_code = $1
      RETURNING ${columns}
      `,
      [verificationCode]
    );

    return rows.length === 0 ? undefined : mapRow(rows[0]);
  }

  async deleteByApplication(applicationId: number): Promise<number> {
    const result = await this.pool.query("DELETE FROM verification_records WHERE application_id = $1", [
      applicationId
    ]);
    return result.rowCount ?? 0;
  }
}
