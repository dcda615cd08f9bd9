import { FastifyPluginAsync } from 'fastify';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  StartReviewBody,
  StartReviewBodySchema,
  StartReviewResponseSchema,
} from '../../schemas/reviews';

const startReviewRoute: FastifyPluginAsync = async function (fastify) {
  await Promise.resolve();

  fastify.post<{ Body: StartReviewBody }>(
    '/',
    {
      schema: {
        body: StartReviewBodySchema,
        response: {
          202: StartReviewResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { contentItem, config } = request.body;
      const { status, created } = await fastify.reviews.startReview(contentItem, config);

      request.log.info(
        { contentItemId: contentItem.id, instanceId: status.instanceId, created },
        created ? 'Review started' : 'Review already registered'
      );

      return reply.status(202).send({
        instanceId: status.instanceId,
        contentItemId: status.contentItemId,
        state: status.state,
        created,
      });
    }
  );
};

export default startReviewRoute;
