import { z } from 'zod';
import type { OperatorAlert, OperatorAlertRecord, OperatorAlerter } from '@contentreview/core';
import { AlertSeverity } from '@contentreview/core';
import type { Queryable } from '../connection';

interface OperatorAlertRow {
  id: string;
  severity: string;
  kind: string;
  content_item_id: string | null;
  message: string;
  details: unknown;
  acknowledged: boolean;
  created_at: Date;
}

export interface OperatorAlertRepository extends OperatorAlerter {
  listOpen(limit: number, offset: number): Promise<OperatorAlertRecord[]>;
  countOpen(): Promise<number>;
  acknowledge(id: string): Promise<boolean>;
}

function mapRow(row: OperatorAlertRow): OperatorAlertRecord {
  return {
    id: row.id,
    severity: z.nativeEnum(AlertSeverity).parse(row.severity),
    kind: row.kind,
    contentItemId: row.content_item_id ?? undefined,
    message: row.message,
    details: z.record(z.string(), z.unknown()).parse(row.details),
    acknowledged: row.acknowledged,
    createdAt: row.created_at,
  };
}

export function createOperatorAlertRepository(pool: Queryable): OperatorAlertRepository {
  return {
    async raise(alert: OperatorAlert): Promise<void> {
      await pool.query(
        `INSERT INTO operator_alerts (severity, kind, content_item_id, message, details)
         VALUES ($1, $2, $3, $4, $5)`,
        [
          alert.severity,
          alert.kind,
          alert.contentItemId ?? null,
          alert.message,
          JSON.stringify(alert.details ?? {}),
        ]
      );
    },

    async listOpen(limit: number, offset: number): Promise<OperatorAlertRecord[]> {
      const result = await pool.query<OperatorAlertRow>(
        `SELECT id, severity, kind, content_item_id, message, details, acknowledged, created_at
         FROM operator_alerts
         WHERE acknowledged = false
         ORDER BY created_at DESC
         LIMIT $1 OFFSET $2`,
        [limit, offset]
      );
      return result.rows.map(mapRow);
    },

    async countOpen(): Promise<number> {
      const result = await pool.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM operator_alerts WHERE acknowledged = false`
      );
      return result.rows[0]?.count ?? 0;
    },

    async acknowledge(id: string): Promise<boolean> {
      const result = await pool.query(
        `UPDATE operator_alerts SET acknowledged = true WHERE id = $1 AND acknowledged = false`,
        [id]
      );
      return result.rowCount === 1;
    },
  };
}
