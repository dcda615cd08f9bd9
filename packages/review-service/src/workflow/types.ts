import {
  AiController,
  AssignmentRepository,
  AuditRepository,
  ContentArchiver,
  ContentItemRepository,
  ContentSummarizer,
  GraphIndexer,
  NotificationDispatcher,
  OperatorAlerter,
  RelevanceScorer,
  ReviewAssignmentSchema,
  ReviewerDirectory,
  SearchIndexer,
  SideEffectRepository,
  WorkflowInstanceRepository,
  z,
} from '@contentreview/core';

export interface ReviewCollaborators {
  scorer: RelevanceScorer;
  searchIndexer: SearchIndexer;
  graphIndexer: GraphIndexer;
  notifier: NotificationDispatcher;
  directory: ReviewerDirectory;
  aiController: AiController;
  summarizer: ContentSummarizer;
  archiver: ContentArchiver;
  alerter: OperatorAlerter;
}

export interface ReviewStores {
  instances: WorkflowInstanceRepository;
  contentItems: ContentItemRepository;
  assignments: AssignmentRepository;
  sideEffects: SideEffectRepository;
  audit: AuditRepository;
}

export const AI_CONTROLLER_ID = 'ai-controller';

/** Results of activities as they are journaled. */

export const ScoredAssessmentSchema = z.object({
  score: z.number(),
  topics: z.array(z.string()),
  entities: z.array(z.string()),
  rationale: z.string(),
});

export type ScoredAssessment = z.infer<typeof ScoredAssessmentSchema>;

export const AssignResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('assigned'), assignment: ReviewAssignmentSchema }),
  z.object({ status: z.literal('no_eligible_reviewer'), poolSize: z.number().int() }),
]);

export type AssignResult = z.infer<typeof AssignResultSchema>;

export const ControllerReviewSchema = z.object({
  approved: z.boolean(),
  rationale: z.string(),
});

export const SearchIndexResultSchema = z.object({
  success: z.boolean(),
  externalUrl: z.string().nullable(),
});

export const SummarySchema = z.object({ summary: z.string() });

export const ArchivedSchema = z.object({ archived: z.boolean() });

export const SuccessSchema = z.object({ success: z.boolean() });

export const DoneSchema = z.object({ done: z.literal(true) });

export type Done = z.infer<typeof DoneSchema>;
