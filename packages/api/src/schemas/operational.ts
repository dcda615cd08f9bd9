import { Type, Static } from '@sinclair/typebox';

export const OperatorAlertSchema = Type.Object({
  id: Type.String(),
  severity: Type.String(),
  kind: Type.String(),
  contentItemId: Type.Union([Type.String(), Type.Null()]),
  message: Type.String(),
  details: Type.Record(Type.String(), Type.Unknown()),
  createdAt: Type.String(),
});

export type OperatorAlertView = Static<typeof OperatorAlertSchema>;

export const AlertParamsSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
});

export type AlertParams = Static<typeof AlertParamsSchema>;

export const RepairTaskSchema = Type.Object({
  id: Type.String(),
  contentItemId: Type.String(),
  side: Type.String(),
  attempts: Type.Number(),
  status: Type.String(),
  lastError: Type.Union([Type.String(), Type.Null()]),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

export type RepairTaskView = Static<typeof RepairTaskSchema>;

export const RepairQuerySchema = Type.Object({
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 100, default: 50 })),
});

export type RepairQuery = Static<typeof RepairQuerySchema>;
