import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('review_collections', {
    id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    name: {
      type: 'varchar(200)',
      notNull: true,
    },
    owner_id: {
      type: 'varchar(100)',
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createTable('collection_reviewers', {
    collection_id: {
      type: 'varchar(100)',
      notNull: true,
      references: 'review_collections(id)',
      onDelete: 'CASCADE',
    },
    reviewer_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    position: {
      type: 'integer',
      notNull: true,
    },
    active: {
      type: 'boolean',
      notNull: true,
      default: true,
    },
    added_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.addConstraint('collection_reviewers', 'collection_reviewers_pkey', {
    primaryKey: ['collection_id', 'reviewer_id'],
  });
  pgm.createIndex('collection_reviewers', ['collection_id', 'position']);

  pgm.createTable('content_items', {
    id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    submitter_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    collection_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    criteria: {
      type: 'jsonb',
      notNull: true,
      default: "'{}'::jsonb",
    },
    payload_ref: {
      type: 'varchar(1000)',
      notNull: true,
    },
    status: {
      type: 'varchar(30)',
      notNull: true,
      default: 'submitted',
      check:
        "status IN ('submitted', 'under_review', 'approved', 'rejected', 'archived', 'needs_attention')",
    },
    status_reason: {
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

  pgm.createIndex('content_items', 'collection_id');
  pgm.createIndex('content_items', 'submitter_id');
  pgm.createIndex('content_items', 'status');
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('content_items');
  pgm.dropTable('collection_reviewers');
  pgm.dropTable('review_collections');
}
