import type { OperatorAlert, OperatorAlerter } from '@contentreview/core';
import type { Logger } from '../utils/logger';

/** Logs every alert at error level before handing it to the store. */
export function withAlertLogging(alerter: OperatorAlerter, logger: Logger): OperatorAlerter {
  return {
    async raise(alert: OperatorAlert): Promise<void> {
      logger.error(
        { alertKind: alert.kind, severity: alert.severity, contentItemId: alert.contentItemId },
        alert.message
      );
      await alerter.raise(alert);
    },
  };
}
