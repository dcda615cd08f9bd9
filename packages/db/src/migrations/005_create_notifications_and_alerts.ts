import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('notifications', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('gen_random_uuid()'),
    },
    user_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    content_item_id: {
      type: 'varchar(100)',
    },
    outcome: {
      type: 'varchar(30)',
    },
    subject: {
      type: 'varchar(300)',
      notNull: true,
    },
    body: {
      type: 'text',
      notNull: true,
    },
    metadata: {
      type: 'jsonb',
      notNull: true,
      default: "'{}'::jsonb",
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createIndex('notifications', ['user_id', 'content_item_id', 'outcome'], {
    name: 'notifications_delivery_unique',
    unique: true,
    where: 'content_item_id IS NOT NULL',
  });

  pgm.createTable('operator_alerts', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('gen_random_uuid()'),
    },
    severity: {
      type: 'varchar(20)',
      notNull: true,
      check: "severity IN ('warning', 'critical')",
    },
    kind: {
      type: 'varchar(60)',
      notNull: true,
    },
    content_item_id: {
      type: 'varchar(100)',
    },
    message: {
      type: 'text',
      notNull: true,
    },
    details: {
      type: 'jsonb',
      notNull: true,
      default: "'{}'::jsonb",
    },
    acknowledged: {
      type: 'boolean',
      notNull: true,
      default: false,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createIndex('operator_alerts', ['acknowledged', 'created_at']);

  pgm.createTable('review_audit_records', {
    content_item_id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    instance_id: {
      type: 'varchar(120)',
      notNull: true,
    },
    final_state: {
      type: 'varchar(40)',
      notNull: true,
    },
    final_decision_kind: {
      type: 'varchar(30)',
    },
    score: {
      type: 'double precision',
    },
    reviewer_id: {
      type: 'varchar(100)',
    },
    transitions: {
      type: 'jsonb',
      notNull: true,
    },
    side_effect_result: {
      type: 'jsonb',
    },
    recorded_at: {
      type: 'timestamp with time zone',
      notNull: true,
    },
  });
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('review_audit_records');
  pgm.dropTable('operator_alerts');
  pgm.dropTable('notifications');
}
