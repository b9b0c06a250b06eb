import { Pool } from "pg";

export const createPostgresPool = (databaseUrl: string): Pool =>
  new Pool({
    connectionString: databaseUrl,
    ssl: /sslmode=require/.test(databaseUrl) ? { rejectUnauthorized: false } : undefined
  });
