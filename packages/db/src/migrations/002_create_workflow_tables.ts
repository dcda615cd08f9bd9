import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('workflow_instances', {
    id: {
      type: 'varchar(120)',
      primaryKey: true,
    },
    content_item_id: {
      type: 'varchar(100)',
      notNull: true,
      unique: true,
      references: 'content_items(id)',
    },
    content_item: {
      type: 'jsonb',
      notNull: true,
    },
    config: {
      type: 'jsonb',
      notNull: true,
    },
    state: {
      type: 'varchar(40)',
      notNull: true,
      default: 'Created',
    },
    current_step: {
      type: 'varchar(100)',
      notNull: true,
      default: 'created',
    },
    retry_counters: {
      type: 'jsonb',
      notNull: true,
      default: "'{}'::jsonb",
    },
    projection: {
      type: 'jsonb',
      notNull: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
    last_checkpoint_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
    archived_at: {
      type: 'timestamp with time zone',
    },
  });

  pgm.createIndex('workflow_instances', 'state');
  pgm.createIndex('workflow_instances', 'archived_at');

  // The journal. seq orders the events of an instance; event_key makes appends idempotent.
  pgm.createTable('workflow_events', {
    seq: {
      type: 'bigserial',
      primaryKey: true,
    },
    instance_id: {
      type: 'varchar(120)',
      notNull: true,
      references: 'workflow_instances(id)',
      onDelete: 'CASCADE',
    },
    event_key: {
      type: 'varchar(200)',
      notNull: true,
    },
    event_type: {
      type: 'varchar(40)',
      notNull: true,
    },
    payload: {
      type: 'jsonb',
      notNull: true,
      default: "'{}'::jsonb",
    },
    recorded_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.addConstraint('workflow_events', 'workflow_events_instance_key_unique', {
    unique: ['instance_id', 'event_key'],
  });
  pgm.createIndex('workflow_events', ['instance_id', 'seq']);

  pgm.createTable('reviewer_cursors', {
    collection_id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    position: {
      type: 'integer',
      notNull: true,
      default: 0,
    },
    version: {
      type: 'integer',
      notNull: true,
      default: 0,
    },
    updated_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createTable('review_assignments', {
    content_item_id: {
      type: 'varchar(100)',
      primaryKey: true,
      references: 'content_items(id)',
    },
    reviewer_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    assigned_at: {
      type: 'timestamp with time zone',
      notNull: true,
    },
    pool_snapshot: {
      type: 'jsonb',
      notNull: true,
      default: "'[]'::jsonb",
    },
    round: {
      type: 'integer',
      notNull: true,
      default: 0,
    },
    resolution: {
      type: 'varchar(20)',
      check: "resolution IN ('decided', 'timed_out')",
    },
    resolved_at: {
      type: 'timestamp with time zone',
    },
  });

  pgm.createIndex('review_assignments', 'reviewer_id', {
    name: 'review_assignments_active_idx',
    where: 'resolution IS NULL',
  });
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('review_assignments');
  pgm.dropTable('reviewer_cursors');
  pgm.dropTable('workflow_events');
  pgm.dropTable('workflow_instances');
}
