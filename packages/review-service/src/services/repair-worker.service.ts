import {
  AlertSeverity,
  GraphIndexer,
  OperatorAlerter,
  PolicyTable,
  RepairTask,
  SearchIndexer,
  SideEffectRepository,
  SideEffectSide,
  TaskType,
  TransientActivityError,
  WorkflowInstanceRepository,
  buildPolicyTable,
  resolvePolicy,
} from '@contentreview/core';
import type { Clock } from '../durable/clock';
import type { WorkerPools } from '../durable/worker-pool';
import { executeWithRetry } from '../durable/retry';
import type { Logger } from '../utils/logger';
import { logPerformance } from '../utils/logger';

export interface RepairWorkerOptions {
  batchSize: number;
  maxAttempts: number;
}

export interface RepairBatchResult {
  processed: number;
  repaired: number;
  failed: number;
  abandoned: number;
}

/**
 * Re-drives the side of a partially indexed item that failed during fan-out.
 * Runs outside any workflow instance; each pass picks up pending tasks.
 * Retries follow the owning instance's policy overrides on top of `policyTable`.
 */
export class RepairWorker {
  constructor(
    private readonly sideEffects: SideEffectRepository,
    private readonly instances: Pick<WorkflowInstanceRepository, 'findByContentItemId'>,
    private readonly indexers: { search: SearchIndexer; graph: GraphIndexer },
    private readonly alerter: OperatorAlerter,
    private readonly runtime: { clock: Clock; pools: WorkerPools; policyTable: PolicyTable },
    private readonly options: RepairWorkerOptions,
    private readonly logger: Logger
  ) {}

  async processBatch(): Promise<RepairBatchResult> {
    const startedAt = this.runtime.clock.now().getTime();
    const tasks = await this.sideEffects.listPendingRepairs(this.options.batchSize);
    const result: RepairBatchResult = {
      processed: tasks.length,
      repaired: 0,
      failed: 0,
      abandoned: 0,
    };

    for (const task of tasks) {
      const outcome = await this.repair(task);
      result[outcome]++;
    }

    if (tasks.length > 0) {
      logPerformance(
        {
          operation: 'repair-batch',
          durationMs: this.runtime.clock.now().getTime() - startedAt,
          success: result.failed === 0 && result.abandoned === 0,
          metadata: { ...result },
        },
        this.logger
      );
    }
    return result;
  }

  private async repair(task: RepairTask): Promise<'repaired' | 'failed' | 'abandoned'> {
    const taskType =
      task.side === SideEffectSide.SEARCH ? TaskType.INDEX_SEARCH : TaskType.INDEX_GRAPH;
    const policy = resolvePolicy(taskType, await this.policyTableFor(task.contentItemId));
    const log = this.logger.child({ repairTaskId: task.id, contentItemId: task.contentItemId });

    const outcome = await executeWithRetry(() => this.runIndexer(task), {
      taskType,
      policy,
      clock: this.runtime.clock,
      pool: this.runtime.pools[policy.queueClass],
      logger: log,
    });

    if (outcome.ok) {
      await this.sideEffects.markSideIndexed(task.contentItemId, task.side, outcome.value);
      await this.sideEffects.completeRepair(task.id);
      log.info({ side: task.side }, 'Side effect repaired');
      return 'repaired';
    }

    const message = outcome.failure.causeMessage;
    const attempts = await this.sideEffects.recordRepairFailure(task.id, message);
    if (attempts < this.options.maxAttempts) {
      log.warn({ side: task.side, attempts, error: message }, 'Repair attempt failed');
      return 'failed';
    }

    await this.sideEffects.abandonRepair(task.id, message);
    await this.alerter.raise({
      severity: AlertSeverity.CRITICAL,
      kind: 'repair_abandoned',
      contentItemId: task.contentItemId,
      message: `Gave up repairing ${task.side} for ${task.contentItemId} after ${attempts} attempts: ${message}`,
      details: { repairTaskId: task.id, side: task.side, attempts },
    });
    log.error({ side: task.side, attempts }, 'Repair abandoned');
    return 'abandoned';
  }

  private async policyTableFor(contentItemId: string): Promise<PolicyTable> {
    const instance = await this.instances.findByContentItemId(contentItemId);
    if (!instance) {
      return this.runtime.policyTable;
    }
    return buildPolicyTable(instance.config.policyOverrides, this.runtime.policyTable);
  }

  /** Resolves with the external URL for search repairs, null for graph repairs. */
  private async runIndexer(task: RepairTask): Promise<string | null> {
    const { contentItemId, topics, entities, collectionId } = task.request;

    if (task.side === SideEffectSide.SEARCH) {
      const result = await this.indexers.search.index(contentItemId, topics, entities, collectionId);
      if (!result.success) {
        throw new TransientActivityError('Search indexer reported failure');
      }
      return result.externalUrl;
    }

    const result = await this.indexers.graph.update(contentItemId, topics, entities, collectionId);
    if (!result.success) {
      throw new TransientActivityError('Graph indexer reported failure');
    }
    return null;
  }
}
