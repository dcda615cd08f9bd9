export const API_VERSION = '0.1.0';

export { buildServer, startServer, closeServer, type BuildServerOptions } from './server';
export {
  PgReviewGateway,
  signalIdFor,
  type ReviewGateway,
  type StartedReview,
  type DecisionReceipt,
  type AlertPage,
} from './services/review-gateway';
