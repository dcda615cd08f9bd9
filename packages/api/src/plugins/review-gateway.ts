import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { ReviewGateway } from '../services/review-gateway';

export interface ReviewGatewayPluginOptions {
  gateway: ReviewGateway;
}

const reviewGatewayPlugin: FastifyPluginAsync<ReviewGatewayPluginOptions> = async (
  fastify,
  options
) => {
  await Promise.resolve();
  fastify.decorate('reviews', options.gateway);
};

export default fp(reviewGatewayPlugin, { name: 'review-gateway' });

declare module 'fastify' {
  interface FastifyInstance {
    reviews: ReviewGateway;
  }
}
