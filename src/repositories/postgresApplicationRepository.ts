import { Pool } from "pg";
import { buildNewApplication, CreateApplicationInput } from "../domain/application";
import { ConcurrentModificationError, NotFoundError } from "../domain/errors";
import {
  Application,
  ApplicationDocuments,
  ApplicationTarget,
  CandidateProfile,
  StatusLabel,
  WorkflowState
} from "../domain/model";
import { phase2Of } from "../domain/workflow";
import { ApplicationRepository } from "./applicationRepository";

interface ApplicationRow {
  id: number;
  target: ApplicationTarget;
  candidate: CandidateProfile;
  staff_notes: string | null;
  workflow: WorkflowState;
  interview_notes: string | null;
  notifications: Application["notifications"];
  documents: ApplicationDocuments;
  status: StatusLabel;
  submitted_at: Date | string;
  updated_at: Date | string;
  version: number;
}

const columns = `
  id, target, candidate, staff_notes, workflow, interview_notes, notifications,
  documents, status, submitted_at, updated_at, version
`;

const mapRow = (row: ApplicationRow): Application => ({
  id: row.id,
  target: row.target,
  candidate: row.candidate,
  staffNotes: row.staff_notes ?? undefined,
  workflow: row.workflow,
  interviewNotes: row.interview_notes ?? undefined,
  notifications: row.notifications,
  documents: row.documents,
  status: row.status,
  submittedAt: new Date(row.submitted_at).toISOString(),
  updatedAt: new Date(row.updated_at).toISOString(),
  version: row.version
});

const workflowColumns = (workflow: WorkflowState): [string, string, string | null] => [
  workflow.phase,
  workflow.phase1.status,
  phase2Of(workflow)?.status ?? null
];

export class PostgresApplicationRepository implements ApplicationRepository {
  constructor(private readonly pool: Pool) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS applications (
        id SERIAL PRIMARY KEY,
        target JSONB NOT NULL,
        candidate JSONB NOT NULL,
        staff_notes TEXT,
        workflow JSONB NOT NULL,
        workflow_phase TEXT NOT NULL DEFAULT 'phase1',
        phase1_status TEXT NOT NULL DEFAULT 'pending',
        phase2_status TEXT,
        interview_notes TEXT,
        notifications JSONB NOT NULL,
        documents JSONB NOT NULL,
        status TEXT NOT NULL DEFAULT 'en attente',
        submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        version INTEGER NOT NULL DEFAULT 1,
        CONSTRAINT phase2_requires_interview
          CHECK (phase2_status IS NULL OR phase1_status = 'selected_for_interview')
      );
    `);
  }

  async create(input: CreateApplicationInput): Promise<Application> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      const { rows } = await client.query<{ id: number }>(
        "SELECT nextval(pg_get_serial_sequence('applications', 'id'))::int AS id"
      );
      const application = buildNewApplication(rows[0].id, input, new Date().toISOString());
      const [workflowPhase, phase1Status, phase2Status] = workflowColumns(application.workflow);

      await client.query(
        `
        INSERT INTO applications (
          id, target, candidate, staff_notes, workflow, workflow_phase, phase1_status, phase2_status,
          interview_notes, notifications, documents, status, submitted_at, updated_at, version
        )
        VALUES ($1, $2::jsonb, $3::jsonb, $4, $5::jsonb, $6, $7, $8, $9, $10::jsonb, $11::jsonb, $12, $13, $14, $15)
        `,
        [
          application.id,
          JSON.stringify(application.target),
          JSON.stringify(application.candidate),
          application.staffNotes ?? null,
          JSON.stringify(application.workflow),
          workflowPhase,
          phase1Status,
          phase2Status,
          application.interviewNotes ?? null,
          JSON.stringify(application.notifications),
          JSON.stringify(application.documents),
          application.status,
          application.submittedAt,
          application.updatedAt,
          application.version
        ]
      );
      await client.query("COMMIT");

      return application;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async findById(id: number): Promise<Application | undefined> {
    const { rows } = await this.pool.query<ApplicationRow>(
      `
      SELECT ${columns}
      FROM applications
      WHERE id = $1
      `,
      [id]
    );

    if (rows.length === 0) {
      return undefined;
    }

    return mapRow(rows[0]);
  }

  async save(application: Application, expectedVersion: number): Promise<Application> {
    const [workflowPhase, phase1Status, phase2Status] = workflowColumns(application.workflow);

    const { rows } = await this.pool.query<ApplicationRow>(
      `
      UPDATE applications
      SET target = $3::jsonb,
          staff_notes = $4,
          workflow = $5::jsonb,
          workflow_phase = $6,
          phase1_status = $7,
          phase2_status = $8,
          interview_notes = $9,
          notifications = $10::jsonb,
          documents = $11::jsonb,
          status = $12,
          updated_at = NOW(),
          version = version + 1
      WHERE id = $1 AND version = $2
      RETURNING ${columns}
      `,
      [
        application.id,
        expectedVersion,
        JSON.stringify(application.target),
        application.staffNotes ?? null,
        JSON.stringify(application.workflow),
        workflowPhase,
        phase1Status,
        phase2Status,
        application.interviewNotes ?? null,
        JSON.stringify(application.notifications),
        JSON.stringify(application.documents),
        application.status
      ]
    );

    if (rows.length === 0) {
      const exists = await this.pool.query("SELECT 1 FROM applications WHERE id = $1", [application.id]);
      if (exists.rowCount === 0) {
        throw new NotFoundError(`Application ${application.id} was not found.`);
      }

      throw new ConcurrentModificationError(application.id);
    }

    return mapRow(rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM applications WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
