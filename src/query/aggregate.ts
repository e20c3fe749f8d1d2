/**
 * Aggregate counts over the whole step tree.
 */

import { isRunComplete, timestampMillis, walkSteps, type Run } from '../ontology/index.js';

export const METRIC_NAMES = [
  'total_steps',
  'total_messages',
  'total_tool_calls',
  'total_completed_tool_calls',
  'total_observations',
  'total_decisions',
  'total_actions',
  'total_interaction_messages',
  'total_anomalies',
  'total_risks',
  'max_depth',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** Metric name to non-negative integer */
export type RunAggregates = Record<MetricName, number>;

export interface RunSummary extends RunAggregates {
  duration_ms: number | null;
  average_step_duration_ms: number | null;
  complete: boolean;
}

export function emptyAggregates(): RunAggregates {
  return {
    total_steps: 0,
    total_messages: 0,
    total_tool_calls: 0,
    total_completed_tool_calls: 0,
    total_observations: 0,
    total_decisions: 0,
    total_actions: 0,
    total_interaction_messages: 0,
    total_anomalies: 0,
    total_risks: 0,
    max_depth: 0,
  };
}

/**
 * Sum counts across every step, visiting each step exactly once.
 * `max_depth` counts levels: 1 when only top-level steps exist.
 */
export function aggregateRun(run: Run): RunAggregates {
  const totals = emptyAggregates();

  for (const { step, depth } of walkSteps(run)) {
    totals.total_steps += 1;
    totals.total_messages += step.messages.length;
    totals.total_tool_calls += step.tool_calls.length;
    totals.total_completed_tool_calls += step.tool_calls.filter(
      (call) => call.output !== undefined || call.end_time !== undefined,
    ).length;
    totals.total_observations += step.perception?.observations.length ?? 0;
    totals.total_decisions += step.cognition?.decisions.length ?? 0;
    totals.total_actions += step.action?.actions.length ?? 0;
    totals.total_interaction_messages += step.interaction?.messages.length ?? 0;
    totals.total_anomalies += step.oversight?.anomalies.length ?? 0;
    totals.total_risks += step.oversight?.risks.length ?? 0;
    totals.max_depth = Math.max(totals.max_depth, depth + 1);
  }

  return totals;
}

function durationMs(start: string, end: string | undefined): number | null {
  return end === undefined ? null : timestampMillis(end) - timestampMillis(start);
}

/**
 * Aggregates plus run duration, mean duration of finished steps and completeness.
 */
export function summarizeRun(run: Run): RunSummary {
  const stepDurations = walkSteps(run)
    .map(({ step }) => durationMs(step.start_time, step.end_time))
    .filter((duration): duration is number => duration !== null);

  return {
    ...aggregateRun(run),
    duration_ms: durationMs(run.start_time, run.end_time),
    average_step_duration_ms:
      stepDurations.length === 0
        ? null
        : stepDurations.reduce((sum, duration) => sum + duration, 0) / stepDurations.length,
    complete: isRunComplete(run),
  };
}
