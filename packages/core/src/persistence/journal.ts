export enum JournalEventType {
  ACTIVITY_COMPLETED = 'activity_completed',
  ACTIVITY_FAILED = 'activity_failed',
  VALUE_RECORDED = 'value_recorded',
  TIMER_STARTED = 'timer_started',
  TIMER_FIRED = 'timer_fired',
  GATE_OPENED = 'gate_opened',
  SIGNAL_RECEIVED = 'signal_received',
  TRANSITION = 'transition',
}

export interface JournalEvent {
  seq: number;
  instanceId: string;
  eventKey: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  recordedAt: Date;
}

export interface NewJournalEvent {
  eventKey: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
}

/**
 * Append-only per-instance event log. `seq` is assigned by the store and
 * totally orders the events of one instance; it is the only ordering used to
 * resolve races between signals and timers.
 */
export interface JournalRepository {
  /** Appends once per `(instanceId, eventKey)`; a repeated key returns the stored event. */
  append(instanceId: string, event: NewJournalEvent): Promise<JournalEvent>;
  list(instanceId: string, afterSeq?: number): Promise<JournalEvent[]>;
}

export function signalEventKey(signalId: string): string {
  return `signal:${signalId}`;
}

export function timerFiredEventKey(timerKey: string): string {
  return `timer_fired:${timerKey}`;
}
