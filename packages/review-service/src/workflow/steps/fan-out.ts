import {
  ContentItem,
  GraphIndexer,
  IndexRequest,
  SearchIndexer,
  SideEffectFailure,
  SideEffectRepository,
  SideEffectResult,
  SideEffectSide,
  TaskType,
  TransientActivityError,
} from '@contentreview/core';
import type { DurableContext } from '../../durable/context';
import type { ActivityOutcome } from '../../durable/retry';
import { SearchIndexResultSchema, SuccessSchema } from '../types';
import { persistStep } from './persist';

export const INDEXER_REPORTED_FAILURE = 'INDEXER_REPORTED_FAILURE';

function failureOf(side: SideEffectSide, outcome: ActivityOutcome<unknown>): SideEffectFailure[] {
  if (outcome.ok) {
    return [];
  }
  return [
    {
      side,
      kind: outcome.failure.kind,
      message: outcome.failure.causeMessage,
      attempts: outcome.failure.attempts,
    },
  ];
}

/**
 * Indexes an approved item into the search and graph stores in parallel.
 * Each side retries under its own policy; when exactly one side fails for
 * good, a repair task is scheduled for that side only.
 */
export class SideEffectFanOutCoordinator {
  constructor(
    private readonly searchIndexer: SearchIndexer,
    private readonly graphIndexer: GraphIndexer,
    private readonly sideEffects: SideEffectRepository
  ) {}

  async run(
    ctx: DurableContext,
    contentItem: ContentItem,
    extraction: { topics: string[]; entities: string[] }
  ): Promise<SideEffectResult> {
    const request: IndexRequest = {
      contentItemId: contentItem.id,
      collectionId: contentItem.collectionId,
      topics: extraction.topics,
      entities: extraction.entities,
    };

    const [search, graph] = await Promise.all([
      ctx.executeActivity(
        { key: 'index:search', taskType: TaskType.INDEX_SEARCH, schema: SearchIndexResultSchema },
        async () => {
          const result = await this.searchIndexer.index(
            request.contentItemId,
            request.topics,
            request.entities,
            request.collectionId
          );
          if (!result.success) {
            throw new TransientActivityError('Search indexer reported failure', INDEXER_REPORTED_FAILURE);
          }
          return result;
        }
      ),
      ctx.executeActivity(
        { key: 'index:graph', taskType: TaskType.INDEX_GRAPH, schema: SuccessSchema },
        async () => {
          const result = await this.graphIndexer.update(
            request.contentItemId,
            request.topics,
            request.entities,
            request.collectionId
          );
          if (!result.success) {
            throw new TransientActivityError('Graph indexer reported failure', INDEXER_REPORTED_FAILURE);
          }
          return result;
        }
      ),
    ]);

    const failures = [
      ...failureOf(SideEffectSide.SEARCH, search),
      ...failureOf(SideEffectSide.GRAPH, graph),
    ];

    const result: SideEffectResult = {
      searchIndexed: search.ok,
      graphUpdated: graph.ok,
      partialFailures: failures,
      repairsScheduled: [],
      externalUrl: search.ok ? search.value.externalUrl : null,
    };

    if (failures.length === 1) {
      const side = failures[0].side;
      await persistStep(ctx, `repair:${side}`, () =>
        this.sideEffects.scheduleRepair(contentItem.id, side, request)
      );
      result.repairsScheduled = [side];
      ctx.logger.warn({ side }, 'Side effect failed, repair scheduled');
    }

    await persistStep(ctx, 'side-effects', () =>
      this.sideEffects.saveResult(contentItem.id, result)
    );

    return result;
  }
}
