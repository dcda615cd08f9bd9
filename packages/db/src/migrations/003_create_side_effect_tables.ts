import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('side_effect_results', {
    content_item_id: {
      type: 'varchar(100)',
      primaryKey: true,
      references: 'content_items(id)',
    },
    search_indexed: {
      type: 'boolean',
      notNull: true,
      default: false,
    },
    graph_updated: {
      type: 'boolean',
      notNull: true,
      default: false,
    },
    partial_failures: {
      type: 'jsonb',
      notNull: true,
      default: "'[]'::jsonb",
    },
    repairs_scheduled: {
      type: 'jsonb',
      notNull: true,
      default: "'[]'::jsonb",
    },
    external_url: {
      type: 'text',
    },
    updated_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createTable('repair_tasks', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('gen_random_uuid()'),
    },
    content_item_id: {
      type: 'varchar(100)',
      notNull: true,
      references: 'content_items(id)',
    },
    side: {
      type: 'varchar(10)',
      notNull: true,
      check: "side IN ('search', 'graph')",
    },
    request: {
      type: 'jsonb',
      notNull: true,
    },
    attempts: {
      type: 'integer',
      notNull: true,
      default: 0,
    },
    status: {
      type: 'varchar(20)',
      notNull: true,
      default: 'pending',
      check: "status IN ('pending', 'completed', 'abandoned')",
    },
    last_error: {
      type: 'text',
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
    updated_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.addConstraint('repair_tasks', 'repair_tasks_item_side_unique', {
    unique: ['content_item_id', 'side'],
  });
  pgm.createIndex('repair_tasks', ['status', 'updated_at']);
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('repair_tasks');
  pgm.dropTable('side_effect_results');
}
