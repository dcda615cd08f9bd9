import { describe, it, expect, vi } from 'vitest';
import {
  AlertSeverity,
  InstanceNotFoundError,
  OperatorAlert,
  WorkflowInstanceRecord,
  defaultWorkflowConfig,
} from '@contentreview/core';
import { DurableRuntime } from '../../src/durable/runtime';
import type { DurableContext } from '../../src/durable/context';
import { createWorkerPools } from '../../src/durable/worker-pool';
import { createInMemoryStores } from '../helpers/in-memory-stores';
import { ManualClock, flush } from '../helpers/manual-clock';
import { makeContentItem } from '../helpers/fakes';
import { silentLogger } from '../helpers/logger';

const INSTANCE_ID = 'review-item-1';

type RunFn = (ctx: DurableContext, record: WorkflowInstanceRecord) => Promise<void>;

async function setup(run: RunFn, options: { maxCrashRestarts?: number } = {}) {
  const clock = new ManualClock();
  const stores = createInMemoryStores(clock);
  const runner = { run: vi.fn<RunFn>(run) };
  const alerter = { raise: vi.fn(async (_alert: OperatorAlert) => undefined) };
  const onCrash = vi.fn(async (_error: Error, _metadata: Record<string, unknown>) => undefined);

  await stores.instances.create({
    id: INSTANCE_ID,
    contentItem: makeContentItem(),
    config: defaultWorkflowConfig(),
  });

  const runtime = new DurableRuntime({
    journal: stores.journal,
    instances: stores.instances,
    clock,
    pools: createWorkerPools(),
    runner,
    alerter,
    logger: silentLogger,
    onCrash,
    maxCrashRestarts: options.maxCrashRestarts,
  });

  const settle = async (): Promise<void> => {
    for (let pass = 0; pass < 3; pass++) {
      await flush();
      await runtime.whenIdle();
    }
  };

  return { clock, stores, runner, alerter, onCrash, runtime, settle };
}

function waitForever(ctx: DurableContext): Promise<void> {
  return ctx
    .awaitSignalOrTimer({ sinceSeq: 0, timerKey: 'never', accept: () => null })
    .then(() => undefined);
}

describe('DurableRuntime', () => {
  it('should resume every unarchived instance once', async () => {
    const { runtime, runner, settle } = await setup(async () => undefined);

    await expect(runtime.resumeAll()).resolves.toBe(1);
    await settle();

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runtime.runningCount).toBe(0);
  });

  it('should not start an archived instance', async () => {
    const { runtime, runner, stores } = await setup(async () => undefined);
    await stores.instances.archive(INSTANCE_ID, new Date('2026-03-01T00:00:00.000Z'));

    await expect(runtime.startById(INSTANCE_ID)).resolves.toBe(false);
    await expect(runtime.resumeAll()).resolves.toBe(0);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it('should report a suspended instance as idle and keep it running', async () => {
    const { runtime, settle } = await setup(waitForever);

    await runtime.startById(INSTANCE_ID);
    await settle();

    expect(runtime.isRunning(INSTANCE_ID)).toBe(true);
    expect(runtime.runningCount).toBe(1);
  });

  it('should restart a crashed instance after a backoff', async () => {
    const { runtime, runner, onCrash, clock, settle } = await setup(async () => undefined);
    runner.run.mockRejectedValueOnce(new Error('store unavailable'));

    await runtime.startById(INSTANCE_ID);
    await settle();

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(onCrash).toHaveBeenCalledWith(expect.objectContaining({ message: 'store unavailable' }), {
      instanceId: INSTANCE_ID,
      crashes: 1,
    });

    clock.advance(999);
    await settle();
    expect(runner.run).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await settle();
    expect(runner.run).toHaveBeenCalledTimes(2);
    expect(runtime.isParked(INSTANCE_ID)).toBe(false);
  });

  it('should leave a crashed instance to its backoff when everything is resumed', async () => {
    const { runtime, runner, clock, settle } = await setup(async () => {
      throw new Error('boom');
    });

    await runtime.startById(INSTANCE_ID);
    await settle();

    await expect(runtime.resumeAll()).resolves.toBe(0);
    await expect(runtime.startById(INSTANCE_ID)).resolves.toBe(false);
    await settle();
    expect(runner.run).toHaveBeenCalledTimes(1);

    clock.advance(1000);
    await settle();
    expect(runner.run).toHaveBeenCalledTimes(2);
    expect(runtime.isParked(INSTANCE_ID)).toBe(false);
  });

  it('should park an instance that keeps crashing and alert an operator', async () => {
    const { runtime, runner, alerter, clock, settle } = await setup(
      async () => {
        throw new Error('boom');
      },
      { maxCrashRestarts: 2 }
    );

    await runtime.startById(INSTANCE_ID);
    await settle();
    clock.advance(1000);
    await settle();
    clock.advance(2000);
    await settle();

    expect(runner.run).toHaveBeenCalledTimes(3);
    expect(runtime.isParked(INSTANCE_ID)).toBe(true);
    expect(alerter.raise).toHaveBeenCalledWith({
      severity: AlertSeverity.CRITICAL,
      kind: 'instance_crash_loop',
      contentItemId: 'item-1',
      message: 'Review workflow review-item-1 crashed 3 times and was parked: boom',
      details: { instanceId: INSTANCE_ID, crashes: 3 },
    });
    expect(clock.pendingTimers).toBe(0);
    await expect(runtime.resumeAll()).resolves.toBe(0);
  });

  it('should journal a signal once and wake the instance', async () => {
    const { runtime, runner, stores, settle } = await setup(waitForever);
    await runtime.startById(INSTANCE_ID);
    await settle();

    await runtime.deliverSignal(INSTANCE_ID, 'sig-1', { approved: true, reviewerId: 'bob' });
    await runtime.deliverSignal(INSTANCE_ID, 'sig-1', { approved: false, reviewerId: 'bob' });
    await settle();

    const signals = await stores.journal.list(INSTANCE_ID);
    expect(signals).toHaveLength(1);
    expect(signals[0].payload).toEqual({ approved: true, reviewerId: 'bob' });
    expect(runner.run).toHaveBeenCalledTimes(1);
  });

  it('should start a dormant instance when a signal arrives', async () => {
    const { runtime, runner, settle } = await setup(waitForever);

    await runtime.deliverSignal(INSTANCE_ID, 'sig-1', { approved: true, reviewerId: 'bob' });
    await settle();

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runtime.isRunning(INSTANCE_ID)).toBe(true);
  });

  it('should reject queries and starts for unknown instances', async () => {
    const { runtime } = await setup(async () => undefined);

    await expect(runtime.query('review-missing')).rejects.toBeInstanceOf(InstanceNotFoundError);
    await expect(runtime.startById('review-missing')).rejects.toThrow(
      'Review workflow not found: review-missing'
    );
  });

  it('should suspend running instances on shutdown without counting a crash', async () => {
    const { runtime, onCrash, settle } = await setup(waitForever);
    await runtime.startById(INSTANCE_ID);
    await settle();

    await runtime.shutdown();

    expect(runtime.runningCount).toBe(0);
    expect(onCrash).not.toHaveBeenCalled();
    await expect(runtime.startById(INSTANCE_ID)).resolves.toBe(false);
  });
});
