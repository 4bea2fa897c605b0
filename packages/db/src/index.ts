import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { schema } from './schemas/index.js';

export * from './schemas/index.js';
export * from './utils.js';

// The pool connects lazily; DATABASE_URL is checked by the API's env validation.
export const pool = new Pool({ connectionString: process.env.DATABASE_URL });

export const db = drizzle(pool, { schema });
export type DbClient = typeof db;
export type DbTransaction = Parameters<Parameters<DbClient['transaction']>[0]>[0];

export const closeDb = async () => {
  await pool.end();
};
