import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import {
  ControllerType,
  DecisionKind,
  ReviewState,
  ReviewStatus,
  emptyProjection,
} from '@contentreview/core';
import { createTestServer } from '../setup';
import { InMemoryReviewGateway } from '../helpers/in-memory-gateway';
import {
  DecisionAcceptedResponse,
  ErrorResponse,
  StartReviewResponse,
} from '../helpers/types';
import { signalIdFor } from '../../src/services/review-gateway';

const contentItem = {
  id: 'item-1',
  submitterId: 'alice',
  collectionId: 'col-1',
  criteria: { topic: 'durable execution' },
  payloadRef: 'submissions/item-1.md',
};

describe('Review routes', () => {
  let server: FastifyInstance;
  let gateway: InMemoryReviewGateway;

  beforeEach(async () => {
    ({ server, gateway } = await createTestServer());
  });

  afterEach(async () => {
    await server.close();
  });

  async function startReview(): Promise<void> {
    await server.inject({
      method: 'POST',
      url: '/api/v1/reviews',
      payload: { contentItem },
    });
  }

  describe('POST /api/v1/reviews', () => {
    it('should register the item and return its instance', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews',
        payload: { contentItem, config: { reviewSlaMs: 3600000 } },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json<StartReviewResponse>()).toEqual({
        instanceId: 'review-item-1',
        contentItemId: 'item-1',
        state: ReviewState.CREATED,
        created: true,
      });
      expect(gateway.statuses.has('item-1')).toBe(true);
    });

    it('should return the existing instance when the item is submitted again', async () => {
      await startReview();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews',
        payload: { contentItem },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json<StartReviewResponse>().created).toBe(false);
      expect(gateway.statuses.size).toBe(1);
    });

    it('should reject an invalid workflow configuration', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews',
        payload: { contentItem, config: { thresholds: { rejectBelow: 8 } } },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json<ErrorResponse>();
      expect(body.error.code).toBe('INVALID_CONFIG');
      expect(body.error.details).toEqual({
        issues: [
          {
            path: 'thresholds.rejectBelow',
            message: 'rejectBelow (8) must not exceed reviewBelow (7)',
          },
        ],
      });
      expect(gateway.statuses.size).toBe(0);
    });

    it('should reject a content item without a payload reference', async () => {
      const withoutPayload = {
        id: contentItem.id,
        submitterId: contentItem.submitterId,
        collectionId: contentItem.collectionId,
        criteria: contentItem.criteria,
      };

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews',
        payload: { contentItem: withoutPayload },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/reviews/:contentItemId/decision', () => {
    it('should accept a reviewer decision', async () => {
      await startReview();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews/item-1/decision',
        payload: { approved: true, reviewerId: 'bob' },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json<DecisionAcceptedResponse>()).toEqual({
        accepted: true,
        signalId: signalIdFor('item-1', { approved: true, reviewerId: 'bob' }),
        duplicate: false,
      });
      expect(gateway.signals).toEqual([
        {
          contentItemId: 'item-1',
          signalId: signalIdFor('item-1', { approved: true, reviewerId: 'bob' }),
          signal: { approved: true, reviewerId: 'bob' },
        },
      ]);
    });

    it('should report a repeated decision as a duplicate', async () => {
      await startReview();
      const payload = { approved: false, reviewerId: 'bob', notes: 'off topic' };

      await server.inject({ method: 'POST', url: '/api/v1/reviews/item-1/decision', payload });
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews/item-1/decision',
        payload,
      });

      expect(response.statusCode).toBe(202);
      expect(response.json<DecisionAcceptedResponse>().duplicate).toBe(true);
      expect(gateway.signals).toHaveLength(1);
    });

    it('should use the idempotency key as the signal id', async () => {
      await startReview();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews/item-1/decision',
        headers: { 'idempotency-key': 'decision-42' },
        payload: { approved: true, reviewerId: 'bob' },
      });

      expect(response.json<DecisionAcceptedResponse>().signalId).toBe('decision-42');
      expect(gateway.signals[0]?.signalId).toBe('decision-42');
    });

    it('should reject a decision without an approval flag', async () => {
      await startReview();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews/item-1/decision',
        payload: { reviewerId: 'bob' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().error.code).toBe('INVALID_SIGNAL');
      expect(gateway.signals).toHaveLength(0);
    });

    it('should return 404 for an unknown item', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/reviews/ghost/decision',
        payload: { approved: true, reviewerId: 'bob' },
      });

      expect(response.statusCode).toBe(404);
      const body = response.json<ErrorResponse>();
      expect(body.error.code).toBe('NOT_FOUND');
      expect(body.error.message).toBe('Review workflow not found: ghost');
    });
  });

  describe('GET /api/v1/reviews/:contentItemId', () => {
    it('should return the review projection', async () => {
      const status: ReviewStatus = {
        ...emptyProjection(),
        instanceId: 'review-item-2',
        contentItemId: 'item-2',
        state: ReviewState.COMPLETED,
        currentStep: 'completed',
        archived: true,
        score: 6.1,
        decision: {
          kind: DecisionKind.HUMAN_APPROVE,
          score: 6.1,
          timestamp: '2026-03-02T10:00:00.000Z',
          controllerId: 'bob',
          controller: ControllerType.HUMAN,
        },
        transitions: [
          { from: ReviewState.CREATED, to: ReviewState.SCORING, at: '2026-03-02T09:00:00.000Z' },
        ],
      };
      gateway.statuses.set('item-2', status);

      const response = await server.inject({ method: 'GET', url: '/api/v1/reviews/item-2' });

      expect(response.statusCode).toBe(200);
      expect(response.json<ReviewStatus>()).toEqual(status);
    });

    it('should return 404 for an unknown item', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/reviews/ghost' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorResponse>().error.code).toBe('NOT_FOUND');
    });
  });
});
