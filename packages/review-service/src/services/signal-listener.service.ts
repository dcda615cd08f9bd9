import type { Client, Notification } from 'pg';
import { REVIEW_SIGNALS_CHANNEL, REVIEW_WORKFLOWS_CHANNEL } from '@contentreview/db';
import type { Logger } from '../utils/logger';
import { logError, toError } from '../utils/logger';

export interface WakeTarget {
  startById(instanceId: string): Promise<boolean>;
  wake(instanceId: string): Promise<void>;
}

/**
 * Bridges Postgres notifications from the API process to the runtime: new
 * instances are started, signalled ones re-read their journal.
 */
export class SignalListener {
  private listening = false;

  constructor(
    private readonly client: Client,
    private readonly target: WakeTarget,
    private readonly logger: Logger
  ) {}

  async start(): Promise<void> {
    this.client.on('notification', (message) => {
      this.handle(message);
    });
    this.client.on('error', (error) => {
      logError(error, { operation: 'signal-listener' }, this.logger);
    });

    await this.client.connect();
    await this.client.query(`LISTEN ${REVIEW_WORKFLOWS_CHANNEL}`);
    await this.client.query(`LISTEN ${REVIEW_SIGNALS_CHANNEL}`);
    this.listening = true;
    this.logger.info(
      { channels: [REVIEW_WORKFLOWS_CHANNEL, REVIEW_SIGNALS_CHANNEL] },
      'Listening for review notifications'
    );
  }

  async stop(): Promise<void> {
    if (!this.listening) {
      return;
    }
    this.listening = false;
    await this.client.end();
  }

  handle(message: Notification): void {
    const instanceId = message.payload;
    if (!instanceId) {
      this.logger.warn({ channel: message.channel }, 'Notification without instance id');
      return;
    }

    const action: Promise<unknown> | null =
      message.channel === REVIEW_WORKFLOWS_CHANNEL
        ? this.target.startById(instanceId)
        : message.channel === REVIEW_SIGNALS_CHANNEL
          ? this.target.wake(instanceId)
          : null;

    if (action === null) {
      this.logger.debug({ channel: message.channel }, 'Ignoring notification on unknown channel');
      return;
    }

    action.catch((error: unknown) => {
      logError(toError(error), { operation: 'handle-notification', instanceId }, this.logger);
    });
  }
}
