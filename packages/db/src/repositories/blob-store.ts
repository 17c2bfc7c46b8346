import type { BlobStore } from '@rephrase/core';
import { getPool, query, type Queryable } from '../connection';

export const BLOB_STORE_TABLE = 'blob_store';

interface BlobRow {
  value: Buffer;
}

/**
 * BlobStore backed by the `blob_store` table. Writes replace the previous value.
 */
export function createPgBlobStore(db: Queryable = getPool()): BlobStore {
  return {
    async get(key: string): Promise<Buffer | null> {
      const result = await query<BlobRow>(
        `SELECT value FROM ${BLOB_STORE_TABLE} WHERE key = $1`,
        [key],
        db
      );

      const row = result.rows[0];
      return row ? Buffer.from(row.value) : null;
    },

    async set(key: string, value: Buffer): Promise<void> {
      await query(
        `INSERT INTO ${BLOB_STORE_TABLE} (key, value, updated_at)
         VALUES ($1, $2, now())
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
        [key, value],
        db
      );
    },
  };
}
