import { Client, Pool } from 'pg';
import { buildPolicyTable } from '@contentreview/core';
import {
  checkConnection,
  createAssignmentRepository,
  createAuditRepository,
  createContentArchiver,
  createContentItemRepository,
  createGraphStore,
  createJournalRepository,
  createNotificationDispatcher,
  createOperatorAlertRepository,
  createPool,
  createReviewerCursorRepository,
  createReviewerDirectory,
  createSearchStore,
  createSideEffectRepository,
  createWorkflowInstanceRepository,
} from '@contentreview/db';
import { logger, toError } from './utils/logger';
import { Env, validateEnv } from './config/env';
import { createWorkerPools } from './durable/worker-pool';
import { systemClock } from './durable/clock';
import { createReviewService, ReviewService } from './app';
import { CheckpointService, createServiceStateRepository } from './services/checkpoint.service';
import { RepairWorker } from './services/repair-worker.service';
import { withAlertLogging } from './services/alerting';
import { SignalListener } from './services/signal-listener.service';
import { AnthropicReviewAdapter } from './adapters/anthropic-review-adapter';
import { FilePayloadResolver } from './adapters/file-payload-resolver';

const MIN_LOOP_INTERVAL_MS = 1000;
const HEARTBEAT_INTERVAL_MS = 2 * 60 * 1000;

let isShuttingDown = false;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Housekeeping loop. Instances themselves are event driven; this loop only
 * drains repair tasks, catches notifications that were missed while the
 * listener reconnected, and writes the service heartbeat.
 */
async function mainLoop(
  env: Env,
  service: ReviewService,
  repairWorker: RepairWorker,
  checkpoint: CheckpointService
): Promise<void> {
  logger.info('Review service starting main loop');

  const previousState = await checkpoint.restoreState();
  if (previousState) {
    logger.info(
      { runningInstances: previousState.runningInstances, timestamp: previousState.timestamp },
      'Restored service heartbeat'
    );
  }

  let consecutiveEmptyIterations = 0;
  let currentLoopInterval = env.REPAIR_INTERVAL_MS;
  let lastHeartbeat = 0;

  while (!isShuttingDown) {
    try {
      const repairs = await repairWorker.processBatch();
      const resumed = await service.runtime.resumeAll();
      service.runtime.pokeAll();

      if (repairs.processed > 0 || resumed > 0) {
        consecutiveEmptyIterations = 0;
        currentLoopInterval = Math.max(MIN_LOOP_INTERVAL_MS, env.REPAIR_INTERVAL_MS / 10);
      } else {
        consecutiveEmptyIterations++;
        currentLoopInterval = Math.min(
          env.REPAIR_INTERVAL_MS * Math.pow(1.5, Math.min(consecutiveEmptyIterations, 5)),
          env.REPAIR_INTERVAL_MS * 4
        );
      }

      const now = Date.now();
      if (now - lastHeartbeat >= HEARTBEAT_INTERVAL_MS || repairs.processed > 0) {
        await checkpoint.saveState({
          runningInstances: service.runtime.runningCount,
          resumedInstances: resumed,
          repairsProcessed: repairs.processed,
          timestamp: new Date(now),
          metadata: {
            pools: Object.values(service.pools).map((pool) => pool.stats()),
            consecutiveEmptyIterations,
          },
        });
        lastHeartbeat = now;
        logger.debug('Heartbeat checkpoint saved');
      }

      await sleep(currentLoopInterval);
    } catch (error) {
      const err = toError(error);
      logger.error({ error: err.message, stack: err.stack }, 'Error in main loop');

      await checkpoint.saveErrorState(err, { phase: 'main_loop' });

      await sleep(currentLoopInterval);
    }
  }

  logger.info('Main loop exited');
}

async function gracefulShutdown(
  env: Env,
  pool: Pool,
  service: ReviewService,
  listener: SignalListener,
  reason: string
): Promise<void> {
  logger.info({ reason }, 'Initiating graceful shutdown');
  isShuttingDown = true;

  const shutdownTimer = setTimeout(() => {
    logger.warn('Shutdown timeout reached, forcing exit');
    process.exit(1);
  }, env.SHUTDOWN_TIMEOUT_MS);

  try {
    await listener.stop();
    await service.runtime.shutdown();

    await pool.end();
    logger.info('Database pool closed');

    clearTimeout(shutdownTimer);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    const err = toError(error);
    logger.error({ error: err.message }, 'Error during shutdown');
    clearTimeout(shutdownTimer);
    process.exit(1);
  }
}

async function start(): Promise<void> {
  const env = validateEnv();
  logger.info({ env: env.NODE_ENV }, 'Review service starting');

  const pool = createPool({ connectionString: env.DATABASE_URL, logger });

  try {
    await checkConnection(pool);
    logger.info('Database connection established');
  } catch (error) {
    logger.fatal({ error: toError(error).message }, 'Failed to connect to database');
    process.exit(1);
  }

  const checkpoint = new CheckpointService(createServiceStateRepository(pool));
  const alerts = createOperatorAlertRepository(pool);
  const pools = createWorkerPools({
    aiBound: env.AI_BOUND_CONCURRENCY,
    ioBound: env.IO_BOUND_CONCURRENCY,
    lightweight: env.LIGHTWEIGHT_CONCURRENCY,
  });

  const payloads = new FilePayloadResolver(env.PAYLOAD_ROOT);
  if (!env.ANTHROPIC_API_KEY) {
    logger.fatal('ANTHROPIC_API_KEY not set - scoring is unavailable');
    process.exit(1);
  }
  const reviewer = AnthropicReviewAdapter.fromApiKey(
    env.ANTHROPIC_API_KEY,
    payloads,
    logger.child({ component: 'anthropic' }),
    { model: env.ANTHROPIC_MODEL }
  );
  const searchStore = createSearchStore(pool, { publicBaseUrl: env.SEARCH_PUBLIC_URL });
  const graphStore = createGraphStore(pool);
  const directory = createReviewerDirectory(pool);

  const service = createReviewService({
    stores: {
      journal: createJournalRepository(pool),
      instances: createWorkflowInstanceRepository(pool),
      contentItems: createContentItemRepository(pool),
      cursors: createReviewerCursorRepository(pool),
      assignments: createAssignmentRepository(pool),
      sideEffects: createSideEffectRepository(pool),
      audit: createAuditRepository(pool),
    },
    collaborators: {
      scorer: reviewer,
      aiController: reviewer,
      summarizer: reviewer,
      searchIndexer: searchStore,
      graphIndexer: graphStore,
      notifier: createNotificationDispatcher(pool),
      directory,
      archiver: createContentArchiver(pool),
      alerter: alerts,
    },
    clock: systemClock,
    pools,
    logger,
    onCrash: (error, metadata) => checkpoint.saveErrorState(error, { phase: 'instance', ...metadata }),
  });

  const repairWorker = new RepairWorker(
    createSideEffectRepository(pool),
    createWorkflowInstanceRepository(pool),
    { search: searchStore, graph: graphStore },
    withAlertLogging(alerts, logger),
    { clock: systemClock, pools, policyTable: buildPolicyTable() },
    { batchSize: env.REPAIR_BATCH_SIZE, maxAttempts: env.MAX_REPAIR_ATTEMPTS },
    logger.child({ component: 'repair-worker' })
  );

  const listener = new SignalListener(
    new Client({ connectionString: env.DATABASE_URL }),
    service.runtime,
    logger.child({ component: 'signal-listener' })
  );
  await listener.start();

  const resumed = await service.runtime.resumeAll();
  logger.info({ resumed }, 'Review workflows resumed from journal');

  process.on('SIGTERM', () => {
    void gracefulShutdown(env, pool, service, listener, 'SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown(env, pool, service, listener, 'SIGINT');
  });

  try {
    await mainLoop(env, service, repairWorker, checkpoint);
  } catch (error) {
    const err = toError(error);
    logger.fatal({ error: err.message, stack: err.stack }, 'Fatal error in main loop');
    await pool.end();
    process.exit(1);
  }
}

void start();
