/**
 * Timeline extraction.
 *
 * One event per step start/end, message, tool-call invocation and tool-call
 * completion, ordered by timestamp. Events sharing a timestamp keep pre-order
 * emission order: step start, its tool calls (invocation then completion),
 * its messages, its sub-steps, then its end.
 */

import { MAX_STEP_DEPTH, timestampMillis, type Run, type Step } from '../ontology/index.js';

export type TimelineEventKind = 'step_start' | 'step_end' | 'message' | 'tool_call' | 'tool_result';

export interface TimelineEvent {
  timestamp: string;
  event_kind: TimelineEventKind;
  step_id: string;
  payload_summary: string;
  /** Pre-order emission position, the tie-break for equal timestamps */
  sequence: number;
  depth: number;
}

export interface TimelineOptions {
  /** Emit `step_end` events (default true) */
  includeStepEnd?: boolean;
}

const SUMMARY_LIMIT = 80;

/** Shorten to at most `limit` code points, so surrogate pairs stay whole. */
export function truncate(text: string, limit = SUMMARY_LIMIT): string {
  const chars = Array.from(text);
  return chars.length > limit ? `${chars.slice(0, limit - 3).join('')}...` : text;
}

type Frame = { type: 'enter' | 'exit'; step: Step; depth: number };

export function extractTimeline(run: Run, options: TimelineOptions = {}): TimelineEvent[] {
  const includeStepEnd = options.includeStepEnd ?? true;
  const events: TimelineEvent[] = [];

  const emit = (timestamp: string | undefined, kind: TimelineEventKind, step: Step, depth: number, summary: string) => {
    if (timestamp === undefined) return;
    events.push({
      timestamp,
      event_kind: kind,
      step_id: step.id,
      payload_summary: summary,
      sequence: events.length,
      depth,
    });
  };

  const stack: Frame[] = [...run.steps].reverse().map((step): Frame => ({ type: 'enter', step, depth: 0 }));
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { step, depth } = frame;

    if (frame.type === 'exit') {
      if (includeStepEnd) emit(step.end_time, 'step_end', step, depth, `Finished ${step.name}`);
      continue;
    }
    if (depth >= MAX_STEP_DEPTH) {
      throw new Error(`Step tree deeper than ${MAX_STEP_DEPTH} levels at step "${step.id}"`);
    }

    emit(step.start_time, 'step_start', step, depth, `Started ${step.name}`);
    for (const call of step.tool_calls) {
      emit(call.start_time, 'tool_call', step, depth, truncate(`${call.name}(${JSON.stringify(call.input)})`));
      const result = call.output === undefined ? `${call.name} completed` : `${call.name} → ${JSON.stringify(call.output)}`;
      emit(call.end_time, 'tool_result', step, depth, truncate(result));
    }
    for (const message of step.messages) {
      emit(message.timestamp, 'message', step, depth, truncate(`${message.role}: ${message.content}`));
    }

    stack.push({ type: 'exit', step, depth });
    for (let index = step.sub_steps.length - 1; index >= 0; index -= 1) {
      stack.push({ type: 'enter', step: step.sub_steps[index], depth: depth + 1 });
    }
  }

  return events
    .map((event) => ({ event, millis: timestampMillis(event.timestamp) }))
    .sort((a, b) => a.millis - b.millis || a.event.sequence - b.event.sequence)
    .map(({ event }) => event);
}
