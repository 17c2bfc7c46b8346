import { describe, it, expect, vi } from 'vitest';
import type { MigrationBuilder } from 'node-pg-migrate';
import { up, down } from '../../src/migrations/001_create_blob_store';

function mockBuilder() {
  const pgm = {
    createTable: vi.fn(),
    createIndex: vi.fn(),
    dropTable: vi.fn(),
    func: vi.fn((sql: string) => `func:${sql}`),
  };
  return { pgm, builder: pgm as unknown as MigrationBuilder };
}

describe('001_create_blob_store', () => {
  it('creates the keyed blob table', () => {
    const { pgm, builder } = mockBuilder();

    up(builder);

    expect(pgm.createTable).toHaveBeenCalledWith('blob_store', {
      key: { type: 'varchar(200)', primaryKey: true },
      value: { type: 'bytea', notNull: true },
      updated_at: { type: 'timestamp with time zone', notNull: true, default: 'func:now()' },
    });
    expect(pgm.createIndex).toHaveBeenCalledWith('blob_store', ['updated_at']);
  });

  it('drops the table on rollback', () => {
    const { pgm, builder } = mockBuilder();

    down(builder);

    expect(pgm.dropTable).toHaveBeenCalledWith('blob_store');
  });
});
