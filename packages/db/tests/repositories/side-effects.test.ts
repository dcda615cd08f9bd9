import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Pool } from 'pg';
import { SideEffectSide } from '@contentreview/core';
import { createSideEffectRepository } from '../../src/repositories/side-effects';

const request = {
  contentItemId: 'item-1',
  collectionId: 'col-1',
  topics: ['climate'],
  entities: ['ipcc'],
};

const repairRow = {
  id: 'repair-1',
  content_item_id: 'item-1',
  side: 'search',
  request,
  attempts: 0,
  status: 'pending',
  last_error: null,
  created_at: new Date('2026-02-01T10:00:00.000Z'),
  updated_at: new Date('2026-02-01T10:00:00.000Z'),
};

describe('createSideEffectRepository', () => {
  let mockPoolQuery: ReturnType<typeof vi.fn>;
  let mockPool: Pool;

  beforeEach(() => {
    mockPoolQuery = vi.fn();
    mockPool = { query: mockPoolQuery } as unknown as Pool;
  });

  it('should map a stored side-effect result', async () => {
    mockPoolQuery.mockResolvedValueOnce({
      rows: [
        {
          search_indexed: false,
          graph_updated: true,
          partial_failures: [
            { side: 'search', kind: 'permanent', message: 'mapping rejected', attempts: 1 },
          ],
          repairs_scheduled: ['search'],
          external_url: null,
        },
      ],
    });

    const result = await createSideEffectRepository(mockPool).findResult('item-1');

    expect(result).toEqual({
      searchIndexed: false,
      graphUpdated: true,
      partialFailures: [
        { side: SideEffectSide.SEARCH, kind: 'permanent', message: 'mapping rejected', attempts: 1 },
      ],
      repairsScheduled: [SideEffectSide.SEARCH],
      externalUrl: null,
    });
  });

  it('should schedule a repair and map the task', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [repairRow] });

    const task = await createSideEffectRepository(mockPool).scheduleRepair(
      'item-1',
      SideEffectSide.SEARCH,
      request
    );

    expect(task.side).toBe(SideEffectSide.SEARCH);
    expect(task.request).toEqual(request);
    expect(task.status).toBe('pending');
    expect(mockPoolQuery.mock.calls[0]?.[1]).toEqual(['item-1', 'search', JSON.stringify(request)]);
  });

  it('should return the incremented attempt count on failure', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [{ attempts: 2 }] });

    const attempts = await createSideEffectRepository(mockPool).recordRepairFailure(
      'repair-1',
      'still down'
    );

    expect(attempts).toBe(2);
  });

  it('should throw when recording a failure for an unknown task', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [] });

    await expect(
      createSideEffectRepository(mockPool).recordRepairFailure('missing', 'x')
    ).rejects.toThrow('Repair task missing not found');
  });

  it('should pass the side and url when marking a side indexed', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await createSideEffectRepository(mockPool).markSideIndexed(
      'item-1',
      SideEffectSide.SEARCH,
      'https://search.test/documents/item-1'
    );

    expect(mockPoolQuery.mock.calls[0]?.[1]).toEqual([
      'item-1',
      'search',
      'https://search.test/documents/item-1',
    ]);
  });
});
