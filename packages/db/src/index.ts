export const DB_VERSION = '0.1.0';
export {
  createPool,
  timedQuery,
  checkConnection,
  withTransaction,
  type DbLogger,
  type CreatePoolOptions,
  type Queryable,
} from './connection';
export * from './channels';
export * from './repositories/content-items';
export * from './repositories/workflow-instances';
export * from './repositories/workflow-events';
export * from './repositories/reviewer-cursors';
export * from './repositories/review-assignments';
export * from './repositories/side-effects';
export * from './repositories/audit-records';
export * from './repositories/reviewer-directory';
export * from './repositories/notifications';
export * from './repositories/operator-alerts';
export * from './repositories/content-archiver';
export * from './knowledge/search-store';
export * from './knowledge/graph-store';
