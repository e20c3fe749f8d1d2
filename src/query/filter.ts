/**
 * Filtered extraction over every entity in a run.
 *
 * Entities are visited in pre-order: each step, then its tool calls,
 * messages, observations, decisions, risk assessments, actions, interaction
 * messages, anomalies and risks, then its sub-steps.
 */

import {
  SEVERITY_LEVELS,
  walkSteps,
  type ActionExecution,
  type Anomaly,
  type Decision,
  type InteractionMessage,
  type Message,
  type Observation,
  type Risk,
  type RiskAssessment,
  type Run,
  type Severity,
  type Step,
  type ToolCall,
} from '../ontology/index.js';

export type EntityRef =
  | { step_id: string; kind: 'step'; entity: Step }
  | { step_id: string; kind: 'tool_call'; entity: ToolCall }
  | { step_id: string; kind: 'message'; entity: Message }
  | { step_id: string; kind: 'observation'; entity: Observation }
  | { step_id: string; kind: 'decision'; entity: Decision }
  | { step_id: string; kind: 'risk_assessment'; entity: RiskAssessment }
  | { step_id: string; kind: 'action'; entity: ActionExecution }
  | { step_id: string; kind: 'interaction_message'; entity: InteractionMessage }
  | { step_id: string; kind: 'anomaly'; entity: Anomaly }
  | { step_id: string; kind: 'risk'; entity: Risk };

export type EntityKind = EntityRef['kind'];

export type FlaggedEvent = Extract<EntityRef, { kind: 'anomaly' | 'risk' | 'risk_assessment' }> & {
  severity: Severity;
};

export interface FlagFilterOptions {
  /** Drop flags below this severity (default `low`, i.e. keep all) */
  minSeverity?: Severity;
}

function entitiesOf(step: Step): EntityRef[] {
  const step_id = step.id;
  return [
    { step_id, kind: 'step', entity: step },
    ...step.tool_calls.map((entity): EntityRef => ({ step_id, kind: 'tool_call', entity })),
    ...step.messages.map((entity): EntityRef => ({ step_id, kind: 'message', entity })),
    ...(step.perception?.observations ?? []).map((entity): EntityRef => ({ step_id, kind: 'observation', entity })),
    ...(step.cognition?.decisions ?? []).map((entity): EntityRef => ({ step_id, kind: 'decision', entity })),
    ...(step.cognition?.risk_assessments ?? []).map(
      (entity): EntityRef => ({ step_id, kind: 'risk_assessment', entity }),
    ),
    ...(step.action?.actions ?? []).map((entity): EntityRef => ({ step_id, kind: 'action', entity })),
    ...(step.interaction?.messages ?? []).map(
      (entity): EntityRef => ({ step_id, kind: 'interaction_message', entity }),
    ),
    ...(step.oversight?.anomalies ?? []).map((entity): EntityRef => ({ step_id, kind: 'anomaly', entity })),
    ...(step.oversight?.risks ?? []).map((entity): EntityRef => ({ step_id, kind: 'risk', entity })),
  ];
}

/**
 * Every entity matching `predicate`, in discovery order.
 */
export function collectEntities(run: Run, predicate: (ref: EntityRef) => boolean): EntityRef[] {
  const matches: EntityRef[] = [];
  for (const { step } of walkSteps(run)) {
    for (const ref of entitiesOf(step)) {
      if (predicate(ref)) matches.push(ref);
    }
  }
  return matches;
}

export function collectByKind<K extends EntityKind>(run: Run, kind: K): Array<Extract<EntityRef, { kind: K }>> {
  return collectEntities(run, (ref) => ref.kind === kind).filter(
    (ref): ref is Extract<EntityRef, { kind: K }> => ref.kind === kind,
  );
}

export function severityRank(severity: Severity): number {
  return SEVERITY_LEVELS.indexOf(severity);
}

/**
 * Severity of a cognition risk assessment, from probability × impact.
 */
export function assessmentSeverity(assessment: RiskAssessment): Severity {
  const exposure = assessment.probability * assessment.impact;
  if (exposure >= 0.75) return 'critical';
  if (exposure >= 0.5) return 'high';
  if (exposure >= 0.25) return 'medium';
  return 'low';
}

function toFlag(ref: EntityRef): FlaggedEvent | null {
  switch (ref.kind) {
    case 'anomaly':
      return { ...ref, severity: ref.entity.severity };
    case 'risk':
      return { ...ref, severity: ref.entity.level };
    case 'risk_assessment':
      return { ...ref, severity: assessmentSeverity(ref.entity) };
    default:
      return null;
  }
}

/**
 * All oversight anomalies, oversight risks and cognition risk assessments,
 * at any nesting depth, in discovery order.
 */
export function collectFlaggedEvents(run: Run, options: FlagFilterOptions = {}): FlaggedEvent[] {
  const threshold = severityRank(options.minSeverity ?? 'low');
  const flags: FlaggedEvent[] = [];
  for (const ref of collectEntities(run, (candidate) => toFlag(candidate) !== null)) {
    const flag = toFlag(ref);
    if (flag && severityRank(flag.severity) >= threshold) {
      flags.push(flag);
    }
  }
  return flags;
}
