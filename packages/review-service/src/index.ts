export const SERVICE_VERSION = '0.1.0';

export * from './app';
export * from './durable/clock';
export * from './durable/worker-pool';
export * from './durable/retry';
export * from './durable/context';
export * from './durable/runtime';
export * from './services/reviewer-assignment.service';
export * from './services/repair-worker.service';
export * from './services/signal-listener.service';
export * from './services/checkpoint.service';
export * from './services/alerting';
export * from './workflow/types';
export * from './workflow/review-orchestrator';
export * from './workflow/steps/wait-gate';
export * from './workflow/steps/fan-out';
export * from './workflow/steps/notification.step';
export * from './adapters/anthropic-review-adapter';
export * from './adapters/file-payload-resolver';
