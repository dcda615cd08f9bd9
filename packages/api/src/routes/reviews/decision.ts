import { FastifyPluginAsync } from 'fastify';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  ContentItemParams,
  ContentItemParamsSchema,
  DecisionAcceptedResponseSchema,
  DecisionBody,
  DecisionBodySchema,
  DecisionHeaders,
  DecisionHeadersSchema,
} from '../../schemas/reviews';

const decisionRoute: FastifyPluginAsync = async function (fastify) {
  await Promise.resolve();

  fastify.post<{ Params: ContentItemParams; Body: DecisionBody; Headers: DecisionHeaders }>(
    '/:contentItemId/decision',
    {
      attachValidation: true,
      schema: {
        params: ContentItemParamsSchema,
        headers: DecisionHeadersSchema,
        body: DecisionBodySchema,
        response: {
          202: DecisionAcceptedResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      if (request.validationError) {
        return reply.status(400).send({
          error: {
            statusCode: 400,
            message: request.validationError.message,
            requestId: request.id,
            code: 'INVALID_SIGNAL',
          },
        });
      }

      const { contentItemId } = request.params;
      const receipt = await fastify.reviews.submitDecision(
        contentItemId,
        request.body,
        request.headers['idempotency-key']
      );

      request.log.info(
        {
          contentItemId,
          reviewerId: request.body.reviewerId,
          approved: request.body.approved,
          signalId: receipt.signalId,
          duplicate: receipt.duplicate,
        },
        receipt.duplicate ? 'Duplicate review decision ignored' : 'Review decision accepted'
      );

      return reply.status(202).send({
        accepted: true,
        signalId: receipt.signalId,
        duplicate: receipt.duplicate,
      });
    }
  );
};

export default decisionRoute;
