import { Pool } from 'pg';
import type { DbConfig } from './config.js';

export type SourceRow = Record<string, unknown>;

/** The part of a `pg` client the pipeline needs; a `Pool` satisfies it. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: SourceRow[] }>;
}

export function createPool(config: DbConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });
}

export function asQueryable(pool: Pool): Queryable {
  return {
    query: (text, params) => pool.query(text, params),
  };
}
