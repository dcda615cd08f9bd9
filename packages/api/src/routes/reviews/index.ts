import { FastifyPluginAsync } from 'fastify';
import startReviewRoute from './start';
import decisionRoute from './decision';
import statusRoute from './status';

const reviewRoutes: FastifyPluginAsync = async (fastify) => {
  await fastify.register(startReviewRoute);
  await fastify.register(decisionRoute);
  await fastify.register(statusRoute);
};

export default reviewRoutes;
