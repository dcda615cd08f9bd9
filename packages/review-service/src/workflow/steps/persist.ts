import { TaskType } from '@contentreview/core';
import type { DurableContext } from '../../durable/context';
import { Done, DoneSchema } from '../types';

/**
 * Runs a store write exactly once per key. A write that exhausts its retries
 * throws, which crashes the instance into a restart instead of recording a
 * permanent failure.
 */
export async function persistStep(
  ctx: DurableContext,
  key: string,
  work: () => Promise<unknown>
): Promise<void> {
  await ctx.executeActivity<Done>(
    { key: `persist:${key}`, taskType: TaskType.PERSIST, schema: DoneSchema, onFailure: 'throw' },
    async () => {
      await work();
      return { done: true };
    }
  );
}
