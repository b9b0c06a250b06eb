import { Pool } from "pg";

export interface JobSummary {
  id: number;
  title: string;
}

/** Read-only view over job postings owned by the job management module. */
export interface JobCatalog {
  init?(): Promise<void>;
  findById(jobId: number): Promise<JobSummary | undefined>;
}

export class InMemoryJobCatalog implements JobCatalog {
  private readonly jobs: Map<number, JobSummary>;

  constructor(jobs: JobSummary[] = []) {
    this.jobs = new Map(jobs.map((job) => [job.id, job]));
  }

  async findById(jobId: number): Promise<JobSummary | undefined> {
    return this.jobs.get(jobId);
  }
}

export class PostgresJobCatalog implements JobCatalog {
  constructor(private readonly pool: Pool) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS jobs (
        id SERIAL PRIMARY KEY,
        title TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async findById(jobId: number): Promise<JobSummary | undefined> {
    const { rows } = await this.pool.query<JobSummary>("SELECT id, title FROM jobs WHERE id = $1", [jobId]);
    return rows[0];
  }
}
