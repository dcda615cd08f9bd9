import { FastifyPluginAsync } from 'fastify';
import type { OperatorAlertRecord } from '@contentreview/core';
import {
  ErrorResponseSchema,
  PaginatedResponseSchema,
  PaginationQuery,
  PaginationQuerySchema,
  SuccessResponseSchema,
} from '../../schemas/common';
import {
  AlertParams,
  AlertParamsSchema,
  OperatorAlertSchema,
  OperatorAlertView,
} from '../../schemas/operational';

function toView(alert: OperatorAlertRecord): OperatorAlertView {
  return {
    id: alert.id,
    severity: alert.severity,
    kind: alert.kind,
    contentItemId: alert.contentItemId ?? null,
    message: alert.message,
    details: alert.details ?? {},
    createdAt: alert.createdAt.toISOString(),
  };
}

const alertsRoute: FastifyPluginAsync = async function (fastify) {
  await Promise.resolve();

  fastify.get<{ Querystring: PaginationQuery }>(
    '/alerts',
    {
      schema: {
        querystring: PaginationQuerySchema,
        response: {
          200: PaginatedResponseSchema(OperatorAlertSchema),
        },
      },
    },
    async (request, reply) => {
      const limit = request.query.limit ?? 20;
      const offset = request.query.offset ?? 0;

      const page = await fastify.reviews.listOpenAlerts(limit, offset);

      return reply.status(200).send({
        items: page.items.map(toView),
        total: page.total,
        limit,
        offset,
        hasMore: offset + page.items.length < page.total,
      });
    }
  );

  fastify.post<{ Params: AlertParams }>(
    '/alerts/:id/acknowledge',
    {
      schema: {
        params: AlertParamsSchema,
        response: {
          200: SuccessResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const acknowledged = await fastify.reviews.acknowledgeAlert(request.params.id);

      if (!acknowledged) {
        return reply.status(404).send({
          error: {
            statusCode: 404,
            message: `Open alert ${request.params.id} not found`,
            requestId: request.id,
            code: 'ALERT_NOT_FOUND',
          },
        });
      }

      request.log.info({ alertId: request.params.id }, 'Operator alert acknowledged');

      return reply.status(200).send({
        success: true,
        message: 'Alert acknowledged',
      });
    }
  );
};

export default alertsRoute;
