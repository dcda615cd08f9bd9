import { describe, it, expect } from 'vitest';
import {
  VERSION,
  ReviewState,
  DecisionKind,
  QueueClass,
  ContentItemSchema,
  DecisionSchema,
  z,
} from '../src/index';

describe('core', () => {
  it('exports VERSION', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports enums', () => {
    expect(ReviewState.AWAITING_SIGNAL).toBe('AwaitingSignal');
    expect(DecisionKind.TIMEOUT_REJECT).toBe('TimeoutReject');
    expect(QueueClass.AI_BOUND).toBe('AIBound');
  });

  it('exports Zod schemas', () => {
    expect(ContentItemSchema).toBeDefined();
    expect(DecisionSchema).toBeDefined();
  });

  it('exports Zod for consumers', () => {
    expect(z).toBeDefined();
    expect(z.string).toBeDefined();
  });
});
