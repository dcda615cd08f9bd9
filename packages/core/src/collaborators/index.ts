import type { ReviewCriteria, RelevanceAssessment } from '../domain/content';
import type { AlertSeverity, NotificationOutcome } from '../domain/enums';

export interface RelevanceScorer {
  assess(
    contentItemId: string,
    payloadRef: string,
    criteria: ReviewCriteria
  ): Promise<RelevanceAssessment>;
}

export interface SearchIndexResult {
  success: boolean;
  externalUrl: string | null;
}

export interface SearchIndexer {
  index(
    contentItemId: string,
    topics: string[],
    entities: string[],
    collectionId: string
  ): Promise<SearchIndexResult>;
}

export interface GraphIndexer {
  update(
    contentItemId: string,
    topics: string[],
    entities: string[],
    collectionId: string
  ): Promise<{ success: boolean }>;
}

export interface NotificationMetadata {
  contentItemId: string;
  outcome: NotificationOutcome;
  externalUrl?: string | null;
  [key: string]: unknown;
}

export interface NotificationDispatcher {
  send(
    userId: string,
    subject: string,
    body: string,
    metadata?: NotificationMetadata
  ): Promise<{ success: boolean }>;
}

export interface ReviewerDirectory {
  /** Ordered reviewer pool of a collection; the order drives round-robin rotation. */
  poolFor(collectionId: string): Promise<string[]>;
  ownerOf(collectionId: string): Promise<string | null>;
}

export interface ControllerReviewResult {
  approved: boolean;
  rationale: string;
}

export interface AiController {
  review(
    contentItemId: string,
    payloadRef: string,
    score: number,
    criteria: ReviewCriteria
  ): Promise<ControllerReviewResult>;
}

export interface ContentSummarizer {
  summarize(contentItemId: string, payloadRef: string): Promise<{ summary: string }>;
}

export interface ContentArchiver {
  archive(contentItemId: string, reason: string): Promise<{ archived: boolean }>;
}

export interface OperatorAlert {
  severity: AlertSeverity;
  kind: string;
  contentItemId?: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface OperatorAlertRecord extends OperatorAlert {
  id: string;
  acknowledged: boolean;
  createdAt: Date;
}

export interface OperatorAlerter {
  raise(alert: OperatorAlert): Promise<void>;
}
