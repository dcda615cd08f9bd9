import { FastifyPluginAsync } from 'fastify';
import { Type } from '@sinclair/typebox';
import type { RepairTask } from '@contentreview/core';
import {
  RepairQuery,
  RepairQuerySchema,
  RepairTaskSchema,
  RepairTaskView,
} from '../../schemas/operational';

function toView(task: RepairTask): RepairTaskView {
  return {
    id: task.id,
    contentItemId: task.contentItemId,
    side: task.side,
    attempts: task.attempts,
    status: task.status,
    lastError: task.lastError,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}

const repairsRoute: FastifyPluginAsync = async function (fastify) {
  await Promise.resolve();

  fastify.get<{ Querystring: RepairQuery }>(
    '/repairs',
    {
      schema: {
        querystring: RepairQuerySchema,
        response: {
          200: Type.Object({
            items: Type.Array(RepairTaskSchema),
          }),
        },
      },
    },
    async (request, reply) => {
      const tasks = await fastify.reviews.listPendingRepairs(request.query.limit ?? 50);
      return reply.status(200).send({ items: tasks.map(toView) });
    }
  );
};

export default repairsRoute;
