import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('blob_store', {
    key: {
      type: 'varchar(200)',
      primaryKey: true,
    },
    value: {
      type: 'bytea',
      notNull: true,
    },
    updated_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createIndex('blob_store', ['updated_at']);
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('blob_store');
}
