import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Pool } from 'pg';
import { JournalEventType } from '@contentreview/core';
import { createJournalRepository } from '../../src/repositories/workflow-events';
import { announce, REVIEW_SIGNALS_CHANNEL } from '../../src/channels';

const recordedAt = new Date('2026-02-01T10:00:00.000Z');

function eventRow(seq: string, eventKey: string) {
  return {
    seq,
    instance_id: 'review-item-1',
    event_key: eventKey,
    event_type: 'signal_received',
    payload: { approved: true, reviewerId: 'reviewer-b' },
    recorded_at: recordedAt,
  };
}

describe('createJournalRepository', () => {
  let mockPoolQuery: ReturnType<typeof vi.fn>;
  let mockPool: Pool;

  beforeEach(() => {
    mockPoolQuery = vi.fn();
    mockPool = { query: mockPoolQuery } as unknown as Pool;
  });

  it('should return the inserted event with a numeric seq', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [eventRow('42', 'signal:abc')] });
    const journal = createJournalRepository(mockPool);

    const event = await journal.append('review-item-1', {
      eventKey: 'signal:abc',
      type: JournalEventType.SIGNAL_RECEIVED,
      payload: { approved: true, reviewerId: 'reviewer-b' },
    });

    expect(event).toEqual({
      seq: 42,
      instanceId: 'review-item-1',
      eventKey: 'signal:abc',
      type: JournalEventType.SIGNAL_RECEIVED,
      payload: { approved: true, reviewerId: 'reviewer-b' },
      recordedAt,
    });
    expect(mockPoolQuery).toHaveBeenCalledTimes(1);
    expect(mockPoolQuery.mock.calls[0]?.[1]).toEqual([
      'review-item-1',
      'signal:abc',
      'signal_received',
      JSON.stringify({ approved: true, reviewerId: 'reviewer-b' }),
    ]);
  });

  it('should return the stored event when the key already exists', async () => {
    mockPoolQuery
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [eventRow('7', 'signal:abc')] });
    const journal = createJournalRepository(mockPool);

    const event = await journal.append('review-item-1', {
      eventKey: 'signal:abc',
      type: JournalEventType.SIGNAL_RECEIVED,
      payload: { approved: false, reviewerId: 'reviewer-b' },
    });

    expect(event.seq).toBe(7);
    expect(event.payload).toEqual({ approved: true, reviewerId: 'reviewer-b' });
    expect(mockPoolQuery).toHaveBeenCalledTimes(2);
  });

  it('should list events after a sequence number in order', async () => {
    mockPoolQuery.mockResolvedValueOnce({
      rows: [eventRow('3', 'signal:a'), eventRow('4', 'signal:b')],
    });
    const journal = createJournalRepository(mockPool);

    const events = await journal.list('review-item-1', 2);

    expect(events.map((event) => event.seq)).toEqual([3, 4]);
    expect(mockPoolQuery.mock.calls[0]?.[1]).toEqual(['review-item-1', 2]);
  });

  it('should reject rows with an unknown event type', async () => {
    mockPoolQuery.mockResolvedValueOnce({
      rows: [{ ...eventRow('1', 'x'), event_type: 'mystery' }],
    });
    const journal = createJournalRepository(mockPool);

    await expect(journal.list('review-item-1')).rejects.toThrow();
  });
});

describe('announce', () => {
  it('should publish the instance id on the channel', async () => {
    const mockPoolQuery = vi.fn().mockResolvedValue({ rows: [] });
    const mockPool = { query: mockPoolQuery } as unknown as Pool;

    await announce(mockPool, REVIEW_SIGNALS_CHANNEL, 'review-item-1');

    expect(mockPoolQuery).toHaveBeenCalledWith('SELECT pg_notify($1, $2)', [
      'review_signals',
      'review-item-1',
    ]);
  });
});
