import { JournalEvent, ReviewSignal, ReviewSignalSchema, z } from '@contentreview/core';
import type { DurableContext } from '../../durable/context';

export const GateOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('decided'), signal: ReviewSignalSchema, seq: z.number().int() }),
  z.object({ status: z.literal('timed_out'), seq: z.number().int() }),
]);

export type GateOutcome = z.infer<typeof GateOutcomeSchema>;

export function gateKey(round: number): string {
  return `review:${round}`;
}

export function slaTimerKey(round: number): string {
  return `sla:${round}`;
}

function outcomeKey(round: number): string {
  return `gate-outcome:${round}`;
}

/**
 * Human review window of one assignment round. Only a well-formed signal
 * from the assigned reviewer can close it; whichever of that signal and the
 * SLA timer comes first in the journal wins. The winner is journaled, and a
 * replay returns it without racing again.
 */
export class ReviewWaitGate {
  /** Opens the gate and arms the SLA timer; returns the deadline. */
  async open(ctx: DurableContext, round: number, slaMs: number): Promise<Date> {
    await ctx.openGate(gateKey(round));
    return ctx.startTimer(slaTimerKey(round), slaMs);
  }

  async await(
    ctx: DurableContext,
    options: { round: number; reviewerId: string; sinceSeq: number }
  ): Promise<GateOutcome> {
    const recorded = ctx.recorded(outcomeKey(options.round), GateOutcomeSchema);
    if (recorded) {
      if (recorded.status === 'decided') {
        ctx.cancelTimer(slaTimerKey(options.round));
      }
      return recorded;
    }

    const ignored = new Set<string>();

    const raced = await ctx.awaitSignalOrTimer<ReviewSignal>({
      sinceSeq: options.sinceSeq,
      timerKey: slaTimerKey(options.round),
      accept: (event) => {
        const signal = this.acceptSignal(event, options.reviewerId);
        if (signal === null && !ignored.has(event.eventKey)) {
          ignored.add(event.eventKey);
          ctx.logger.warn(
            { eventKey: event.eventKey, round: options.round },
            'Ignoring review signal that cannot close this review round'
          );
        }
        return signal;
      },
    });

    const outcome = await ctx.record<GateOutcome>(
      outcomeKey(options.round),
      GateOutcomeSchema,
      () =>
        raced.kind === 'signal'
          ? { status: 'decided', signal: raced.value, seq: raced.seq }
          : { status: 'timed_out', seq: raced.seq }
    );

    if (outcome.status === 'decided') {
      ctx.cancelTimer(slaTimerKey(options.round));
    }
    return outcome;
  }

  private acceptSignal(event: JournalEvent, reviewerId: string): ReviewSignal | null {
    const parsed = ReviewSignalSchema.safeParse(event.payload);
    if (!parsed.success || parsed.data.reviewerId !== reviewerId) {
      return null;
    }
    return parsed.data;
  }
}
