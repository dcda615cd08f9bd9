import { z } from 'zod';
import type { JournalEvent, JournalRepository, NewJournalEvent } from '@contentreview/core';
import { JournalEventType } from '@contentreview/core';
import type { Queryable } from '../connection';

interface WorkflowEventRow {
  seq: string;
  instance_id: string;
  event_key: string;
  event_type: string;
  payload: unknown;
  recorded_at: Date;
}

const COLUMNS = 'seq, instance_id, event_key, event_type, payload, recorded_at';

const PayloadSchema = z.record(z.string(), z.unknown());

function mapRow(row: WorkflowEventRow): JournalEvent {
  return {
    // bigserial arrives as a string
    seq: Number(row.seq),
    instanceId: row.instance_id,
    eventKey: row.event_key,
    type: z.nativeEnum(JournalEventType).parse(row.event_type),
    payload: PayloadSchema.parse(row.payload),
    recordedAt: row.recorded_at,
  };
}

export function createJournalRepository(pool: Queryable): JournalRepository {
  return {
    async append(instanceId: string, event: NewJournalEvent): Promise<JournalEvent> {
      const inserted = await pool.query<WorkflowEventRow>(
        `INSERT INTO workflow_events (instance_id, event_key, event_type, payload)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (instance_id, event_key) DO NOTHING
         RETURNING ${COLUMNS}`,
        [instanceId, event.eventKey, event.type, JSON.stringify(event.payload)]
      );

      const row = inserted.rows[0];
      if (row) {
        return mapRow(row);
      }

      const existing = await pool.query<WorkflowEventRow>(
        `SELECT ${COLUMNS} FROM workflow_events WHERE instance_id = $1 AND event_key = $2`,
        [instanceId, event.eventKey]
      );
      const existingRow = existing.rows[0];
      if (!existingRow) {
        throw new Error(`Journal event ${event.eventKey} of ${instanceId} vanished during append`);
      }
      return mapRow(existingRow);
    },

    async list(instanceId: string, afterSeq = 0): Promise<JournalEvent[]> {
      const result = await pool.query<WorkflowEventRow>(
        `SELECT ${COLUMNS} FROM workflow_events
         WHERE instance_id = $1 AND seq > $2
         ORDER BY seq ASC`,
        [instanceId, afterSeq]
      );
      return result.rows.map(mapRow);
    },
  };
}
