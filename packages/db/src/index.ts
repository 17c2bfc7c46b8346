export const DB_VERSION = '0.1.0';
export { getPool, query, close, type Queryable } from './connection';
export * from './repositories/blob-store';
