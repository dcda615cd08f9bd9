import { Type, Static } from '@sinclair/typebox';

const IdentifierSchema = Type.String({ minLength: 1, maxLength: 100 });

export const ContentItemBodySchema = Type.Object({
  id: IdentifierSchema,
  submitterId: IdentifierSchema,
  collectionId: IdentifierSchema,
  criteria: Type.Record(Type.String(), Type.Unknown()),
  payloadRef: Type.String({ minLength: 1, maxLength: 1000 }),
});

export const StartReviewBodySchema = Type.Object({
  contentItem: ContentItemBodySchema,
  config: Type.Optional(Type.Unknown()),
});

export type StartReviewBody = Static<typeof StartReviewBodySchema>;

export const StartReviewResponseSchema = Type.Object({
  instanceId: Type.String(),
  contentItemId: Type.String(),
  state: Type.String(),
  created: Type.Boolean(),
});

export const ContentItemParamsSchema = Type.Object({
  contentItemId: IdentifierSchema,
});

export type ContentItemParams = Static<typeof ContentItemParamsSchema>;

export const DecisionBodySchema = Type.Object(
  {
    approved: Type.Boolean(),
    reviewerId: IdentifierSchema,
    notes: Type.Optional(Type.String({ maxLength: 5000 })),
  },
  { additionalProperties: false }
);

export type DecisionBody = Static<typeof DecisionBodySchema>;

export const DecisionHeadersSchema = Type.Object({
  'idempotency-key': Type.Optional(Type.String({ minLength: 1, maxLength: 200 })),
});

export type DecisionHeaders = Static<typeof DecisionHeadersSchema>;

export const DecisionAcceptedResponseSchema = Type.Object({
  accepted: Type.Literal(true),
  signalId: Type.String(),
  duplicate: Type.Boolean(),
});

const TransitionSchema = Type.Object({
  from: Type.String(),
  to: Type.String(),
  at: Type.String(),
});

export const ReviewStatusResponseSchema = Type.Object({
  instanceId: Type.String(),
  contentItemId: Type.String(),
  state: Type.String(),
  currentStep: Type.String(),
  archived: Type.Boolean(),
  score: Type.Union([Type.Number(), Type.Null()]),
  assignment: Type.Unknown(),
  decision: Type.Unknown(),
  sideEffectResult: Type.Unknown(),
  transitions: Type.Array(TransitionSchema),
  failureReason: Type.Union([Type.String(), Type.Null()]),
});
