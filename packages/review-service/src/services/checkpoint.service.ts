import { Pool } from 'pg';
import { z } from '@contentreview/core';

export interface ServiceHeartbeat {
  runningInstances: number;
  resumedInstances?: number;
  repairsProcessed?: number;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface ServiceStateRepository {
  saveState(serviceName: string, state: ServiceHeartbeat): Promise<void>;
  restoreState(serviceName: string): Promise<ServiceHeartbeat | null>;
  saveError(serviceName: string, error: Error, metadata?: Record<string, unknown>): Promise<void>;
  getLastCheckpointTime(serviceName: string): Promise<Date | null>;
}

const SERVICE_NAME = 'review_service';
const HEALTH_THRESHOLD_MS = 5 * 60 * 1000;

const StoredHeartbeatSchema = z.object({
  runningInstances: z.number().int().nonnegative(),
  resumedInstances: z.number().int().nonnegative().optional(),
  repairsProcessed: z.number().int().nonnegative().optional(),
  timestamp: z.coerce.date(),
  metadata: z.record(z.unknown()).optional(),
});

/**
 * Service-level heartbeat and crash log, separate from the per-instance
 * workflow checkpoints.
 */
export class CheckpointService {
  constructor(
    private readonly repository: ServiceStateRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async saveState(state: ServiceHeartbeat): Promise<void> {
    await this.repository.saveState(SERVICE_NAME, state);
  }

  async restoreState(): Promise<ServiceHeartbeat | null> {
    return this.repository.restoreState(SERVICE_NAME);
  }

  async saveErrorState(error: Error, metadata?: Record<string, unknown>): Promise<void> {
    await this.repository.saveError(SERVICE_NAME, error, metadata);
  }

  async getLastCheckpointTime(): Promise<Date | null> {
    return this.repository.getLastCheckpointTime(SERVICE_NAME);
  }

  async isServiceHealthy(): Promise<boolean> {
    const lastCheckpoint = await this.getLastCheckpointTime();

    if (!lastCheckpoint) {
      return false;
    }

    const threshold = new Date(this.now().getTime() - HEALTH_THRESHOLD_MS);
    return lastCheckpoint > threshold;
  }
}

export function createServiceStateRepository(pool: Pool): ServiceStateRepository {
  return {
    async saveState(serviceName: string, state: ServiceHeartbeat): Promise<void> {
      await pool.query(
        `INSERT INTO service_state (service_name, state, last_checkpoint)
         VALUES ($1, $2, CURRENT_TIMESTAMP)
         ON CONFLICT (service_name)
         DO UPDATE SET state = $2, last_checkpoint = CURRENT_TIMESTAMP`,
        [serviceName, JSON.stringify(state)]
      );
    },

    async restoreState(serviceName: string): Promise<ServiceHeartbeat | null> {
      const result = await pool.query<{ state: unknown }>(
        `SELECT state FROM service_state WHERE service_name = $1`,
        [serviceName]
      );

      if (result.rows.length === 0) {
        return null;
      }

      const stateData = result.rows[0].state;
      const parsed = StoredHeartbeatSchema.safeParse(
        typeof stateData === 'string' ? JSON.parse(stateData) : stateData
      );

      if (!parsed.success) {
        throw new Error(`Invalid service state: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }

      return parsed.data;
    },

    async saveError(
      serviceName: string,
      error: Error,
      metadata?: Record<string, unknown>
    ): Promise<void> {
      await pool.query(
        `INSERT INTO service_errors (service_name, error_message, error_stack, metadata)
         VALUES ($1, $2, $3, $4)`,
        [serviceName, error.message, error.stack ?? null, JSON.stringify(metadata ?? {})]
      );
    },

    async getLastCheckpointTime(serviceName: string): Promise<Date | null> {
      const result = await pool.query<{ last_checkpoint: Date }>(
        `SELECT last_checkpoint FROM service_state WHERE service_name = $1`,
        [serviceName]
      );

      if (result.rows.length === 0) {
        return null;
      }

      return new Date(result.rows[0].last_checkpoint);
    },
  };
}
