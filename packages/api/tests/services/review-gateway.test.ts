import { describe, it, expect, vi } from 'vitest';
import { Pool } from 'pg';
import {
  ConfigError,
  ContentItemStatus,
  InstanceNotFoundError,
  ReviewState,
  defaultWorkflowConfig,
  emptyProjection,
} from '@contentreview/core';
import { PgReviewGateway, signalIdFor } from '../../src/services/review-gateway';

const contentItem = {
  id: 'item-1',
  submitterId: 'alice',
  collectionId: 'col-1',
  criteria: { topic: 'durable execution' },
  payloadRef: 'submissions/item-1.md',
};

const createdAt = new Date('2026-03-02T09:00:00.000Z');

const instanceRow = {
  id: 'review-item-1',
  content_item_id: 'item-1',
  content_item: contentItem,
  config: defaultWorkflowConfig(),
  state: 'Created',
  current_step: 'created',
  retry_counters: {},
  projection: emptyProjection(),
  created_at: createdAt,
  last_checkpoint_at: createdAt,
  archived_at: null,
};

const contentItemRow = {
  id: 'item-1',
  submitter_id: 'alice',
  collection_id: 'col-1',
  criteria: contentItem.criteria,
  payload_ref: contentItem.payloadRef,
  status: ContentItemStatus.SUBMITTED,
  status_reason: null,
  created_at: createdAt,
  updated_at: createdAt,
};

interface QueryCall {
  text: string;
  params: unknown[];
}

type QueryHandler = (text: string, params: unknown[]) => unknown[];

function createMockPool(handler: QueryHandler) {
  const calls: QueryCall[] = [];
  const query = vi.fn(async (text: string, params: unknown[] = []) => {
    calls.push({ text, params });
    const rows = handler(text, params);
    return { rows, rowCount: rows.length };
  });
  const release = vi.fn();
  const connect = vi.fn(async () => ({ query, release }));
  const pool = { query, connect } as unknown as Pool;

  const texts = (): string[] => calls.map((call) => call.text);
  const callTo = (fragment: string): QueryCall | undefined =>
    calls.find((call) => call.text.includes(fragment));

  return { pool, calls, connect, release, texts, callTo };
}

function isInstanceLookup(text: string): boolean {
  return text.includes('FROM workflow_instances WHERE content_item_id');
}

describe('PgReviewGateway', () => {
  describe('startReview', () => {
    it('should register the item and announce the new instance on commit', async () => {
      const db = createMockPool((text) => {
        if (text.includes('INSERT INTO content_items')) {
          return [contentItemRow];
        }
        if (text.includes('INSERT INTO workflow_instances')) {
          return [instanceRow];
        }
        return [];
      });

      const result = await new PgReviewGateway(db.pool).startReview(contentItem);

      expect(result.created).toBe(true);
      expect(result.status.instanceId).toBe('review-item-1');
      expect(result.status.state).toBe(ReviewState.CREATED);
      expect(db.texts()[0]).toBe('BEGIN');
      expect(db.texts().at(-1)).toBe('COMMIT');
      expect(db.callTo('pg_notify')?.params).toEqual(['review_workflows', 'review-item-1']);
      expect(db.release).toHaveBeenCalledTimes(1);
    });

    it('should return the existing instance without announcing it again', async () => {
      const db = createMockPool((text) => (isInstanceLookup(text) ? [instanceRow] : []));

      const result = await new PgReviewGateway(db.pool).startReview(contentItem);

      expect(result.created).toBe(false);
      expect(db.callTo('INSERT INTO')).toBeUndefined();
      expect(db.callTo('pg_notify')).toBeUndefined();
    });

    it('should raise an alert and roll back on an invalid configuration', async () => {
      const db = createMockPool(() => []);

      await expect(
        new PgReviewGateway(db.pool).startReview(contentItem, { thresholds: { rejectBelow: 8 } })
      ).rejects.toBeInstanceOf(ConfigError);

      const alertInsert = db.callTo('INSERT INTO operator_alerts');
      expect(alertInsert?.params.slice(0, 3)).toEqual(['warning', 'invalid_config', 'item-1']);
      expect(db.texts()).toContain('ROLLBACK');
      expect(db.callTo('INSERT INTO workflow_instances')).toBeUndefined();
    });
  });

  describe('submitDecision', () => {
    const signal = { approved: true, reviewerId: 'bob' };
    const signalId = signalIdFor('item-1', signal);

    function journalRow(eventKey: string) {
      return {
        seq: '7',
        instance_id: 'review-item-1',
        event_key: eventKey,
        event_type: 'signal_received',
        payload: signal,
        recorded_at: createdAt,
      };
    }

    it('should journal the signal and announce it', async () => {
      const db = createMockPool((text) => {
        if (isInstanceLookup(text)) {
          return [instanceRow];
        }
        if (text.includes('INSERT INTO workflow_events')) {
          return [journalRow(`signal:${signalId}`)];
        }
        return [];
      });

      const receipt = await new PgReviewGateway(db.pool).submitDecision('item-1', signal);

      expect(receipt).toEqual({ signalId, duplicate: false });
      expect(db.callTo('INSERT INTO workflow_events')?.params).toEqual([
        'review-item-1',
        `signal:${signalId}`,
        'signal_received',
        JSON.stringify(signal),
      ]);
      expect(db.callTo('pg_notify')?.params).toEqual(['review_signals', 'review-item-1']);
      expect(db.texts().at(-1)).toBe('COMMIT');
    });

    it('should treat an already journaled signal as a duplicate', async () => {
      const db = createMockPool((text) => {
        if (isInstanceLookup(text)) {
          return [instanceRow];
        }
        if (text.startsWith('SELECT') && text.includes('FROM workflow_events')) {
          return [journalRow(`signal:${signalId}`)];
        }
        return [];
      });

      const receipt = await new PgReviewGateway(db.pool).submitDecision('item-1', signal);

      expect(receipt).toEqual({ signalId, duplicate: true });
      expect(db.callTo('INSERT INTO workflow_events')).toBeUndefined();
      expect(db.callTo('pg_notify')).toBeUndefined();
    });

    it('should use the caller supplied signal id', async () => {
      const db = createMockPool((text) => {
        if (isInstanceLookup(text)) {
          return [instanceRow];
        }
        if (text.includes('INSERT INTO workflow_events')) {
          return [journalRow('signal:decision-42')];
        }
        return [];
      });

      const receipt = await new PgReviewGateway(db.pool).submitDecision(
        'item-1',
        signal,
        'decision-42'
      );

      expect(receipt.signalId).toBe('decision-42');
      expect(db.callTo('INSERT INTO workflow_events')?.params[1]).toBe('signal:decision-42');
    });

    it('should reject a decision for an unknown item', async () => {
      const db = createMockPool(() => []);

      await expect(
        new PgReviewGateway(db.pool).submitDecision('ghost', signal)
      ).rejects.toBeInstanceOf(InstanceNotFoundError);
      expect(db.connect).not.toHaveBeenCalled();
    });
  });

  describe('signalIdFor', () => {
    it('should map the same decision to the same id', () => {
      expect(signalIdFor('item-1', { approved: true, reviewerId: 'bob' })).toBe(
        signalIdFor('item-1', { approved: true, reviewerId: 'bob' })
      );
    });

    it('should distinguish decisions on different items', () => {
      expect(signalIdFor('item-1', { approved: true, reviewerId: 'bob' })).not.toBe(
        signalIdFor('item-2', { approved: true, reviewerId: 'bob' })
      );
    });
  });

  describe('listOpenAlerts', () => {
    it('should return the page with the open total', async () => {
      const db = createMockPool((text) => {
        if (text.includes('COUNT(*)')) {
          return [{ count: 3 }];
        }
        return [
          {
            id: 'alert-1',
            severity: 'critical',
            kind: 'instance_crash_loop',
            content_item_id: 'item-1',
            message: 'Instance parked',
            details: {},
            acknowledged: false,
            created_at: createdAt,
          },
        ];
      });

      const page = await new PgReviewGateway(db.pool).listOpenAlerts(1, 0);

      expect(page.total).toBe(3);
      expect(page.items.map((alert) => alert.id)).toEqual(['alert-1']);
    });
  });
});
