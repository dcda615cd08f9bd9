import type { ContentItem, ContentItemRecord } from '../domain/content';
import type { ContentItemStatus } from '../domain/enums';

export interface ContentItemRepository {
  /** Inserts the item once; the immutable fields of an existing item are never rewritten. */
  insert(item: ContentItem): Promise<{ record: ContentItemRecord; created: boolean }>;
  findById(id: string): Promise<ContentItemRecord | null>;
  updateStatus(id: string, status: ContentItemStatus, reason?: string | null): Promise<void>;
}
