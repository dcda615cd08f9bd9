import type { AuditRecord } from '../domain/workflow';

export interface AuditRepository {
  /** Written once per content item; repeated writes keep the first record. */
  record(audit: AuditRecord): Promise<void>;
  findByContentItem(contentItemId: string): Promise<AuditRecord | null>;
}
