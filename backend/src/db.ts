import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import pg from 'pg';
import { from as copyFrom } from 'pg-copy-streams';
import type { DatabaseConfig } from './config.js';

export type Row = Record<string, unknown>;

export type QueryOutcome = {
  rows: Row[];
  rowCount: number | null;
};

/**
 * One open connection. Every loader operation opens its own session and closes it
 * when the operation ends; nothing is pooled.
 */
export interface DbSession {
  query(text: string, params?: unknown[]): Promise<QueryOutcome>;
  /** Streams `source` into a `COPY ... FROM STDIN` statement and resolves to the copied row count. */
  copyFrom(statement: string, source: Readable): Promise<number>;
  close(): Promise<void>;
}

export type Connect = (config: DatabaseConfig) => Promise<DbSession>;

export const openSession: Connect = async (config) => {
  const client = new pg.Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
  await client.connect();

  return {
    async query(text, params) {
      const result = await client.query(text, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    async copyFrom(statement, source) {
      const stream = client.query(copyFrom(statement));
      await pipeline(source, stream);
      return stream.rowCount;
    },
    async close() {
      await client.end();
    },
  };
};

export async function withTransaction<T>(
  connect: () => Promise<DbSession>,
  fn: (session: DbSession) => Promise<T>
): Promise<T> {
  const session = await connect();
  try {
    await session.query('begin');
    const result = await fn(session);
    await session.query('commit');
    return result;
  } catch (error) {
    await session.query('rollback');
    throw error;
  } finally {
    await session.close();
  }
}
