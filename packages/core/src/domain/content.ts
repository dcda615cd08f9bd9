import { z } from 'zod';
import { ContentItemStatus } from './enums';

export const ReviewCriteriaSchema = z.record(z.string(), z.unknown());

export type ReviewCriteria = z.infer<typeof ReviewCriteriaSchema>;

export const ContentItemSchema = z.object({
  id: z.string().min(1).max(100),
  submitterId: z.string().min(1).max(100),
  collectionId: z.string().min(1).max(100),
  criteria: ReviewCriteriaSchema,
  payloadRef: z.string().min(1).max(1000),
});

export type ContentItem = z.infer<typeof ContentItemSchema>;

export const ContentItemRecordSchema = ContentItemSchema.extend({
  status: z.nativeEnum(ContentItemStatus),
  statusReason: z.string().nullable(),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type ContentItemRecord = z.infer<typeof ContentItemRecordSchema>;

export const RelevanceAssessmentSchema = z.object({
  score: z.number().min(0).max(10),
  topics: z.array(z.string()).default([]),
  entities: z.array(z.string()).default([]),
  rationale: z.string().default(''),
});

export type RelevanceAssessment = z.infer<typeof RelevanceAssessmentSchema>;
