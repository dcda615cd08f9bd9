import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export function up(pgm: MigrationBuilder): void {
  pgm.createTable('search_documents', {
    content_item_id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    collection_id: {
      type: 'varchar(100)',
      notNull: true,
    },
    topics: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
    entities: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
    document: {
      type: 'tsvector',
      notNull: true,
    },
    indexed_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createIndex('search_documents', 'collection_id');
  pgm.createIndex('search_documents', 'document', { method: 'gin' });

  pgm.createTable('graph_nodes', {
    id: {
      type: 'varchar(250)',
      primaryKey: true,
    },
    kind: {
      type: 'varchar(20)',
      notNull: true,
      check: "kind IN ('content', 'topic', 'entity', 'collection')",
    },
    label: {
      type: 'varchar(200)',
      notNull: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.createTable('graph_edges', {
    source_id: {
      type: 'varchar(250)',
      notNull: true,
      references: 'graph_nodes(id)',
      onDelete: 'CASCADE',
    },
    target_id: {
      type: 'varchar(250)',
      notNull: true,
      references: 'graph_nodes(id)',
      onDelete: 'CASCADE',
    },
    relation: {
      type: 'varchar(30)',
      notNull: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('now()'),
    },
  });

  pgm.addConstraint('graph_edges', 'graph_edges_pkey', {
    primaryKey: ['source_id', 'target_id', 'relation'],
  });
  pgm.createIndex('graph_edges', 'target_id');
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('graph_edges');
  pgm.dropTable('graph_nodes');
  pgm.dropTable('search_documents');
}
