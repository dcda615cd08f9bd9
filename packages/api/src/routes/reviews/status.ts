import { FastifyPluginAsync } from 'fastify';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  ContentItemParams,
  ContentItemParamsSchema,
  ReviewStatusResponseSchema,
} from '../../schemas/reviews';

const statusRoute: FastifyPluginAsync = async function (fastify) {
  await Promise.resolve();

  fastify.get<{ Params: ContentItemParams }>(
    '/:contentItemId',
    {
      schema: {
        params: ContentItemParamsSchema,
        response: {
          200: ReviewStatusResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const status = await fastify.reviews.getStatus(request.params.contentItemId);
      return reply.status(200).send(status);
    }
  );
};

export default statusRoute;
