import { Pool } from "pg";

export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
  const connectionString = env.DATABASE_URL;

  const pool = connectionString
    ? new Pool({ connectionString })
    : new Pool({
        host: env.PGHOST,
        port: env.PGPORT ? Number(env.PGPORT) : undefined,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}
