import {
  AlertSeverity,
  InstanceNotFoundError,
  JournalEventType,
  JournalRepository,
  OperatorAlerter,
  PolicyTable,
  ReviewStatus,
  WorkflowInstanceRecord,
  WorkflowInstanceRepository,
  buildPolicyTable,
  reviewStatusOf,
  signalEventKey,
} from '@contentreview/core';
import type { Clock } from './clock';
import type { WorkerPools } from './worker-pool';
import { DurableContext, InstanceSuspendedError } from './context';
import { Logger, createInstanceLogger, logError, toError } from '../utils/logger';

export interface WorkflowRunner {
  run(ctx: DurableContext, record: WorkflowInstanceRecord): Promise<void>;
}

export type CrashSink = (error: Error, metadata: Record<string, unknown>) => Promise<void>;

export interface DurableRuntimeDeps {
  journal: JournalRepository;
  instances: WorkflowInstanceRepository;
  clock: Clock;
  pools: WorkerPools;
  runner: WorkflowRunner;
  alerter: OperatorAlerter;
  logger: Logger;
  /** Receives every unexpected instance crash, e.g. to persist it for operators. */
  onCrash?: CrashSink;
  maxCrashRestarts?: number;
}

interface RunningInstance {
  ctx: DurableContext | null;
  done: Promise<void>;
}

const DEFAULT_MAX_CRASH_RESTARTS = 5;
const CRASH_BACKOFF_BASE_MS = 1000;
const CRASH_BACKOFF_MAX_MS = 60_000;

/**
 * Hosts workflow instances in-process. Instances are started from their
 * persisted record, driven by the runner against a DurableContext and
 * re-run from the journal after a restart or a crash.
 */
export class DurableRuntime {
  private readonly running = new Map<string, RunningInstance>();
  private readonly crashCounts = new Map<string, number>();
  private readonly restartTimers = new Map<string, () => void>();
  /** Instances that exceeded the crash limit; left for an operator until the process restarts. */
  private readonly parked = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private stopping = false;

  constructor(private readonly deps: DurableRuntimeDeps) {}

  get runningCount(): number {
    return this.running.size;
  }

  isRunning(instanceId: string): boolean {
    return this.running.has(instanceId);
  }

  isParked(instanceId: string): boolean {
    return this.parked.has(instanceId);
  }

  /** Starts the instance unless it is already running or archived. */
  async startById(instanceId: string): Promise<boolean> {
    if (this.stopping) {
      return false;
    }
    if (this.running.has(instanceId)) {
      return true;
    }

    const record = await this.deps.instances.findById(instanceId);
    if (!record) {
      throw new InstanceNotFoundError(instanceId);
    }
    return this.start(record);
  }

  /** Instances waiting out a crash backoff are left to their restart timer. */
  start(record: WorkflowInstanceRecord): boolean {
    if (
      this.stopping ||
      record.archivedAt !== null ||
      this.parked.has(record.id) ||
      this.restartTimers.has(record.id)
    ) {
      return false;
    }
    if (this.running.has(record.id)) {
      return true;
    }

    const entry: RunningInstance = { ctx: null, done: Promise.resolve() };
    this.running.set(record.id, entry);
    entry.done = this.execute(record, entry).finally(() => {
      this.running.delete(record.id);
      this.checkIdle();
    });
    return true;
  }

  async resumeAll(): Promise<number> {
    const records = await this.deps.instances.listResumable();
    let started = 0;
    for (const record of records) {
      if (!this.running.has(record.id) && this.start(record)) {
        started++;
      }
    }
    this.deps.logger.info({ resumed: started, found: records.length }, 'Resumed review workflows');
    return started;
  }

  /** Re-reads the journal of a running instance, or resumes a dormant one. */
  async wake(instanceId: string): Promise<void> {
    const entry = this.running.get(instanceId);
    if (entry) {
      entry.ctx?.notify();
      return;
    }
    await this.startById(instanceId);
  }

  /** Makes every running instance re-read its journal; covers missed notifications. */
  pokeAll(): void {
    for (const entry of this.running.values()) {
      entry.ctx?.notify();
    }
  }

  /** Journals a reviewer signal and wakes the instance. Repeated signal ids are ignored. */
  async deliverSignal(
    instanceId: string,
    signalId: string,
    payload: Record<string, unknown>
  ): Promise<void> {
    await this.deps.journal.append(instanceId, {
      eventKey: signalEventKey(signalId),
      type: JournalEventType.SIGNAL_RECEIVED,
      payload,
    });
    await this.wake(instanceId);
  }

  async query(instanceId: string): Promise<ReviewStatus> {
    const record = await this.deps.instances.findById(instanceId);
    if (!record) {
      throw new InstanceNotFoundError(instanceId);
    }
    return reviewStatusOf(record);
  }

  /** Resolves once every running instance is suspended on a signal or timer, or finished. */
  whenIdle(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
      this.checkIdle();
    });
  }

  async shutdown(): Promise<void> {
    this.stopping = true;

    for (const cancel of this.restartTimers.values()) {
      cancel();
    }
    this.restartTimers.clear();

    const pending = [...this.running.values()];
    for (const entry of pending) {
      entry.ctx?.dispose();
    }
    await Promise.all(pending.map((entry) => entry.done));
    this.deps.logger.info({ stopped: pending.length }, 'Durable runtime stopped');
  }

  policyTableFor(record: WorkflowInstanceRecord): PolicyTable {
    return buildPolicyTable(record.config.policyOverrides);
  }

  private async execute(record: WorkflowInstanceRecord, entry: RunningInstance): Promise<void> {
    const logger = createInstanceLogger(record.id, record.contentItemId, this.deps.logger);

    try {
      const ctx = await DurableContext.load(record.id, {
        journal: this.deps.journal,
        clock: this.deps.clock,
        pools: this.deps.pools,
        policyTable: this.policyTableFor(record),
        logger,
        onStateChange: () => this.checkIdle(),
      });
      entry.ctx = ctx;

      if (this.stopping) {
        ctx.dispose();
        return;
      }

      await this.deps.runner.run(ctx, record);
      this.crashCounts.delete(record.id);
    } catch (error) {
      if (error instanceof InstanceSuspendedError) {
        logger.debug('Instance suspended for shutdown');
        return;
      }
      await this.handleCrash(record, error, logger);
    } finally {
      entry.ctx?.dispose();
    }
  }

  private async handleCrash(
    record: WorkflowInstanceRecord,
    error: unknown,
    logger: Logger
  ): Promise<void> {
    const crashes = (this.crashCounts.get(record.id) ?? 0) + 1;
    this.crashCounts.set(record.id, crashes);
    const cause = toError(error);
    const limit = this.deps.maxCrashRestarts ?? DEFAULT_MAX_CRASH_RESTARTS;

    logError(cause, { instanceId: record.id, operation: 'run-instance', crashes }, logger);

    if (this.deps.onCrash) {
      try {
        await this.deps.onCrash(cause, { instanceId: record.id, crashes });
      } catch (sinkError) {
        logError(toError(sinkError), { operation: 'record-crash' }, logger);
      }
    }

    if (crashes > limit) {
      this.parked.add(record.id);
      try {
        await this.deps.alerter.raise({
          severity: AlertSeverity.CRITICAL,
          kind: 'instance_crash_loop',
          contentItemId: record.contentItemId,
          message: `Review workflow ${record.id} crashed ${crashes} times and was parked: ${cause.message}`,
          details: { instanceId: record.id, crashes },
        });
      } catch (alertError) {
        logError(toError(alertError), { operation: 'raise-crash-alert' }, logger);
      }
      return;
    }

    const delayMs = Math.min(CRASH_BACKOFF_BASE_MS * Math.pow(2, crashes - 1), CRASH_BACKOFF_MAX_MS);
    logger.warn({ delayMs, crashes }, 'Scheduling instance restart');
    this.restartTimers.set(
      record.id,
      this.deps.clock.schedule(delayMs, () => {
        this.restartTimers.delete(record.id);
        this.startById(record.id).catch((restartError: unknown) => {
          logError(toError(restartError), { operation: 'restart-instance' }, logger);
        });
      })
    );
  }

  private checkIdle(): void {
    if (this.idleWaiters.length === 0) {
      return;
    }
    for (const entry of this.running.values()) {
      if (!entry.ctx || !entry.ctx.suspended) {
        return;
      }
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
