import { FastifyPluginAsync } from 'fastify';
import alertsRoute from './alerts';
import repairsRoute from './repairs';

const operationalRoutes: FastifyPluginAsync = async (fastify) => {
  await fastify.register(alertsRoute);
  await fastify.register(repairsRoute);
};

export default operationalRoutes;
