import type { ReviewAssignment } from '../domain/workflow';

export interface ReviewerCursor {
  collectionId: string;
  position: number;
  version: number;
}

export interface ReviewerCursorRepository {
  /** Returns the cursor, creating it at position 0 when the collection has none. */
  get(collectionId: string): Promise<ReviewerCursor>;
  /** Moves the cursor only if nobody else did since `expectedVersion` was read. */
  compareAndSwap(collectionId: string, expectedVersion: number, nextPosition: number): Promise<boolean>;
}

export type AssignmentResolution = 'decided' | 'timed_out';

export interface AssignmentRepository {
  /** Upsert keyed by contentItemId; the latest round replaces the previous one. */
  upsert(assignment: ReviewAssignment): Promise<ReviewAssignment>;
  findByContentItem(contentItemId: string): Promise<ReviewAssignment | null>;
  countActive(reviewerId: string): Promise<number>;
  resolve(contentItemId: string, resolution: AssignmentResolution, resolvedAt: Date): Promise<void>;
}
