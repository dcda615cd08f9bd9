import { z, ZodType, ZodTypeDef } from 'zod';
import {
  ActivityFailure,
  JournalEvent,
  JournalEventType,
  JournalRepository,
  NewJournalEvent,
  PolicyTable,
  TaskType,
  resolvePolicy,
  timerFiredEventKey,
} from '@contentreview/core';
import type { Clock } from './clock';
import type { WorkerPools } from './worker-pool';
import { ActivityOutcome, executeWithRetry } from './retry';
import type { Logger } from '../utils/logger';

/** Schema of a journaled value; input is unknown because values come back from JSON. */
export type JournalSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ActivitySpec<T> {
  /** Unique within the instance and stable across replays. */
  key: string;
  taskType: TaskType;
  schema: JournalSchema<T>;
  /**
   * `journal` (default) records a final failure so replays see the same
   * outcome; `throw` leaves no trace and throws the failure, so a restarted
   * instance tries the activity again.
   */
  onFailure?: 'journal' | 'throw';
}

export interface DurableContextDeps {
  journal: JournalRepository;
  clock: Clock;
  pools: WorkerPools;
  policyTable: PolicyTable;
  logger: Logger;
  /** Called whenever the instance suspends or a pending wake settles. */
  onStateChange: () => void;
}

export type WaitOutcome<T> =
  | { kind: 'signal'; value: T; seq: number; eventKey: string }
  | { kind: 'timeout'; seq: number };

export interface WaitOptions<T> {
  /** Only events with a greater seq take part in the race. */
  sinceSeq: number;
  timerKey: string;
  /** Returns null for signals that must be ignored. */
  accept: (event: JournalEvent) => T | null;
}

export class InstanceSuspendedError extends Error {
  constructor(public readonly instanceId: string) {
    super(`Instance ${instanceId} was suspended by runtime shutdown`);
    this.name = 'InstanceSuspendedError';
  }
}

const TIMER_RETRY_MS = 1000;

const CompletedPayloadSchema = z.object({
  value: z.unknown(),
  attempts: z.number().int(),
});

const FailedPayloadSchema = z.object({
  taskType: z.nativeEnum(TaskType),
  kind: z.enum(['transient', 'permanent']),
  attempts: z.number().int(),
  message: z.string(),
  name: z.string(),
});

const TimerStartedSchema = z.object({ fireAt: z.string() });

const GateOpenedSchema = z.object({ openedAt: z.string() });

export function activityEventKey(key: string): string {
  return `activity:${key}`;
}

/**
 * Per-instance view of the journal. Every result the workflow code acts on
 * (activity outcomes, clock readings, timers, signals) passes through here
 * and is journaled first, so re-running the workflow from the start after a
 * restart reproduces the same decisions without repeating finished work.
 */
export class DurableContext {
  private readonly events = new Map<string, JournalEvent>();
  private readonly timers = new Map<string, () => void>();
  private waiter: { resolve: () => void; reject: (error: Error) => void } | null = null;
  private dirty = false;
  private disposed = false;
  private pendingWakes = 0;

  private constructor(
    readonly instanceId: string,
    private readonly deps: DurableContextDeps
  ) {}

  static async load(instanceId: string, deps: DurableContextDeps): Promise<DurableContext> {
    const ctx = new DurableContext(instanceId, deps);
    for (const event of await deps.journal.list(instanceId)) {
      ctx.events.set(event.eventKey, event);
    }
    return ctx;
  }

  get logger(): Logger {
    return this.deps.logger;
  }

  /** True while blocked on a signal or timer with no wake pending. */
  get suspended(): boolean {
    return this.waiter !== null && this.pendingWakes === 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  hasEvent(eventKey: string): boolean {
    return this.events.has(eventKey);
  }

  seqOfActivity(key: string): number | null {
    return this.events.get(activityEventKey(key))?.seq ?? null;
  }

  async executeActivity<T>(
    spec: ActivitySpec<T>,
    fn: (attempt: number) => Promise<T>
  ): Promise<ActivityOutcome<T>> {
    this.assertLive();
    const eventKey = activityEventKey(spec.key);

    const journaled = this.events.get(eventKey);
    if (journaled) {
      return this.replayActivity(journaled, spec);
    }

    const policy = resolvePolicy(spec.taskType, this.deps.policyTable);
    const outcome = await executeWithRetry(fn, {
      taskType: spec.taskType,
      policy,
      clock: this.deps.clock,
      pool: this.deps.pools[policy.queueClass],
      logger: this.deps.logger.child({ activity: spec.key }),
    });

    this.assertLive();
    if (!outcome.ok && spec.onFailure === 'throw') {
      throw outcome.failure;
    }

    const stored = await this.append(
      outcome.ok
        ? {
            eventKey,
            type: JournalEventType.ACTIVITY_COMPLETED,
            payload: { taskType: spec.taskType, value: outcome.value, attempts: outcome.attempts },
          }
        : {
            eventKey,
            type: JournalEventType.ACTIVITY_FAILED,
            payload: {
              taskType: spec.taskType,
              kind: outcome.failure.kind,
              attempts: outcome.failure.attempts,
              message: outcome.failure.causeMessage,
              name: outcome.failure.causeName,
            },
          }
    );

    return this.replayActivity(stored, spec);
  }

  /** Journals a locally computed value once; replays return the first value. */
  record<T>(key: string, schema: JournalSchema<T>, compute: (now: Date) => T): Promise<T> {
    return this.recordEvent(`value:${key}`, JournalEventType.VALUE_RECORDED, schema, compute);
  }

  /** The value journaled under `key` by `record`, or null when nothing is recorded yet. */
  recorded<T>(key: string, schema: JournalSchema<T>): T | null {
    const journaled = this.events.get(`value:${key}`);
    return journaled ? schema.parse(journaled.payload.value) : null;
  }

  recordTransition<T>(
    index: number,
    schema: JournalSchema<T>,
    compute: (now: Date) => T
  ): Promise<T> {
    return this.recordEvent(`transition:${index}`, JournalEventType.TRANSITION, schema, compute);
  }

  /** Wall-clock reading taken once and replayed thereafter. */
  now(key: string): Promise<string> {
    return this.record(`now:${key}`, z.string(), (now) => now.toISOString());
  }

  openGate(key: string): Promise<{ openedAt: string }> {
    return this.recordEvent(`gate:${key}`, JournalEventType.GATE_OPENED, GateOpenedSchema, (now) => ({
      openedAt: now.toISOString(),
    }));
  }

  /**
   * Arms a durable timer. The fire time is journaled on first start, so a
   * restarted instance waits only for what is left of the original duration.
   */
  async startTimer(key: string, durationMs: number): Promise<Date> {
    const started = await this.recordEvent(
      `timer:${key}`,
      JournalEventType.TIMER_STARTED,
      TimerStartedSchema,
      (now) => ({ fireAt: new Date(now.getTime() + durationMs).toISOString() })
    );
    const fireAt = new Date(started.fireAt);

    if (!this.events.has(timerFiredEventKey(key)) && !this.timers.has(key)) {
      const delay = Math.max(0, fireAt.getTime() - this.deps.clock.now().getTime());
      this.armTimer(key, delay);
    }

    return fireAt;
  }

  cancelTimer(key: string): void {
    const cancel = this.timers.get(key);
    if (cancel) {
      cancel();
      this.timers.delete(key);
    }
  }

  /**
   * Suspends until a journaled signal is accepted or the timer fires,
   * whichever has the lower seq. Events are re-read from the journal after
   * every wake. A signal committed late can still take a lower seq than the
   * timer, so callers that act on the outcome journal it with `record`.
   */
  async awaitSignalOrTimer<T>(options: WaitOptions<T>): Promise<WaitOutcome<T>> {
    const firedKey = timerFiredEventKey(options.timerKey);

    for (;;) {
      this.assertLive();
      this.dirty = false;

      const window = await this.deps.journal.list(this.instanceId, options.sinceSeq);
      for (const event of window) {
        this.events.set(event.eventKey, event);

        if (event.type === JournalEventType.TIMER_FIRED && event.eventKey === firedKey) {
          return { kind: 'timeout', seq: event.seq };
        }

        if (event.type === JournalEventType.SIGNAL_RECEIVED) {
          const value = options.accept(event);
          if (value !== null) {
            return { kind: 'signal', value, seq: event.seq, eventKey: event.eventKey };
          }
        }
      }

      if (!this.dirty) {
        await this.suspend();
      }
    }
  }

  /** Wakes a suspended wait; a wake that arrives while running forces one more journal read. */
  notify(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve();
    } else {
      this.dirty = true;
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    for (const cancel of this.timers.values()) {
      cancel();
    }
    this.timers.clear();

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(new InstanceSuspendedError(this.instanceId));
  }

  private async recordEvent<T>(
    eventKey: string,
    type: JournalEventType,
    schema: JournalSchema<T>,
    compute: (now: Date) => T
  ): Promise<T> {
    this.assertLive();

    const journaled = this.events.get(eventKey);
    if (journaled) {
      return schema.parse(journaled.payload.value);
    }

    const stored = await this.append({
      eventKey,
      type,
      payload: { value: compute(this.deps.clock.now()) },
    });
    return schema.parse(stored.payload.value);
  }

  private replayActivity<T>(event: JournalEvent, spec: ActivitySpec<T>): ActivityOutcome<T> {
    if (event.type === JournalEventType.ACTIVITY_COMPLETED) {
      const payload = CompletedPayloadSchema.parse(event.payload);
      return { ok: true, value: spec.schema.parse(payload.value), attempts: payload.attempts };
    }

    if (event.type === JournalEventType.ACTIVITY_FAILED) {
      const payload = FailedPayloadSchema.parse(event.payload);
      return {
        ok: false,
        failure: new ActivityFailure(
          payload.kind,
          payload.taskType,
          payload.attempts,
          payload.message,
          payload.name
        ),
      };
    }

    throw new Error(`Journal key ${event.eventKey} holds a ${event.type} event, not an activity result`);
  }

  private async append(event: NewJournalEvent): Promise<JournalEvent> {
    const stored = await this.deps.journal.append(this.instanceId, event);
    this.events.set(stored.eventKey, stored);
    return stored;
  }

  private armTimer(key: string, delayMs: number): void {
    this.timers.set(
      key,
      this.deps.clock.schedule(delayMs, () => {
        void this.fireTimer(key);
      })
    );
  }

  private async fireTimer(key: string): Promise<void> {
    this.timers.delete(key);
    if (this.disposed) {
      return;
    }

    this.pendingWakes++;
    try {
      await this.append({
        eventKey: timerFiredEventKey(key),
        type: JournalEventType.TIMER_FIRED,
        payload: { timerKey: key },
      });
      this.deps.logger.info({ timerKey: key }, 'Durable timer fired');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.deps.logger.error({ timerKey: key, error: message }, 'Failed to journal timer fire');
      if (!this.disposed) {
        this.armTimer(key, TIMER_RETRY_MS);
      }
    } finally {
      this.pendingWakes--;
      this.notify();
      this.deps.onStateChange();
    }
  }

  private suspend(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.deps.onStateChange();
    });
  }

  private assertLive(): void {
    if (this.disposed) {
      throw new InstanceSuspendedError(this.instanceId);
    }
  }
}
