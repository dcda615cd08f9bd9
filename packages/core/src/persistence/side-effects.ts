import type { SideEffectSide } from '../domain/enums';
import type { SideEffectResult } from '../domain/workflow';

export interface IndexRequest {
  contentItemId: string;
  collectionId: string;
  topics: string[];
  entities: string[];
}

export type RepairStatus = 'pending' | 'completed' | 'abandoned';

export interface RepairTask {
  id: string;
  contentItemId: string;
  side: SideEffectSide;
  request: IndexRequest;
  attempts: number;
  status: RepairStatus;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface SideEffectRepository {
  saveResult(contentItemId: string, result: SideEffectResult): Promise<void>;
  findResult(contentItemId: string): Promise<SideEffectResult | null>;
  markSideIndexed(contentItemId: string, side: SideEffectSide, externalUrl?: string | null): Promise<void>;
  /** Idempotent per `(contentItemId, side)`. */
  scheduleRepair(contentItemId: string, side: SideEffectSide, request: IndexRequest): Promise<RepairTask>;
  listPendingRepairs(limit: number): Promise<RepairTask[]>;
  /** Increments the attempt counter and returns the new value. */
  recordRepairFailure(taskId: string, error: string): Promise<number>;
  completeRepair(taskId: string): Promise<void>;
  abandonRepair(taskId: string, error: string): Promise<void>;
}
