import { FastifyInstance } from 'fastify';
import { validateEnv } from './config/env';
import { startServer, closeServer } from './server';
import { logger, logError, toError } from './utils/logger';

let server: FastifyInstance | null = null;

async function main(): Promise<void> {
  validateEnv();

  server = await startServer();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down gracefully');

    try {
      if (server) {
        await closeServer(server);
        logger.info('Server closed');
      }
      process.exit(0);
    } catch (error) {
      logError(toError(error), { operation: 'shutdown' });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('uncaughtException', (error) => {
    logError(error, { operation: 'uncaughtException' });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logError(toError(reason), { operation: 'unhandledRejection' });
    process.exit(1);
  });
}

void main();
