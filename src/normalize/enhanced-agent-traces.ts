/**
 * Normalizer for agent-traces documents that also report per-layer state.
 *
 * A raw step may carry `perception`, `cognition`, `action`, `interaction`,
 * `state` and `oversight` objects, which are mapped field by field. When a
 * step reports no perception its messages become observations, and when it
 * reports no action its tool calls become action executions. The other layers
 * are never derived: an unreported layer stays absent.
 */

import { ACTION_STATUSES, LAYER_NAMES, MAX_STEP_DEPTH, type Run } from '../ontology/index.js';
import {
  compact,
  expectObject,
  joinPath,
  pickField,
  readArray,
  readNumber,
  readObject,
  readString,
  readStringList,
  readTimestamp,
  requireString,
  toPayload,
} from './fields.js';
import { buildAgentTraceRun, type LayerDrafts, type SnapshotDraft, type StepContext } from './agent-traces.js';
import type { RawObject, RawValue } from './types.js';

export const ENHANCED_AGENT_TRACES_FORMAT = 'agent-traces-enhanced';

type ItemMapper = (raw: RawObject, path: string, fallbackId: string) => SnapshotDraft;

function mapItems(
  raw: RawObject,
  keys: readonly string[],
  path: string,
  idPrefix: string,
  mapItem: ItemMapper,
): SnapshotDraft[] {
  const field = readArray(raw, keys, path);
  if (!field) return [];
  const listPath = joinPath(path, field.key);
  return field.value.map((item, index) => {
    const itemPath = joinPath(listPath, index);
    return mapItem(expectObject(item, itemPath, 'entry'), itemPath, `${idPrefix}-${index}`);
  });
}

function lowered(value: string | undefined): string | undefined {
  return value?.toLowerCase();
}

function mapPerception(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  return {
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    observations: mapItems(raw, ['observations', 'current_observations'], path, `${context.stepId}-obs`, (item, itemPath, fallbackId) => {
      const content = pickField(item, ['content', 'value']);
      return compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        type: readString(item, ['type'], itemPath) ?? 'observation',
        content: content ? content.value : null,
        confidence: readNumber(item, ['confidence'], itemPath),
        timestamp: readTimestamp(item, ['timestamp'], itemPath),
        metadata: readObject(item, ['metadata'], itemPath),
      });
    }),
  };
}

function mapCognition(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  return {
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    decisions: mapItems(raw, ['decisions', 'recent_decisions'], path, `${context.stepId}-decision`, (item, itemPath, fallbackId) => {
      const selected = pickField(item, ['selected_option', 'choice']);
      return compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        summary: readString(item, ['summary', 'description', 'justification'], itemPath) ?? '',
        selected_option: selected?.value,
        confidence: readNumber(item, ['confidence'], itemPath),
        timestamp: readTimestamp(item, ['timestamp'], itemPath),
        justification: readString(item, ['justification'], itemPath),
      });
    }),
    risk_assessments: mapItems(raw, ['risk_assessments'], path, `${context.stepId}-assessment`, (item, itemPath, fallbackId) =>
      compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        target_id: readString(item, ['target_id'], itemPath) ?? context.stepId,
        probability: readNumber(item, ['probability'], itemPath),
        impact: readNumber(item, ['impact'], itemPath),
        factors: readStringList(item, ['factors'], itemPath),
      }),
    ),
  };
}

function mapAction(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  return {
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    actions: mapItems(raw, ['actions', 'completed_actions'], path, `${context.stepId}-action`, (item, itemPath, fallbackId) => {
      const parameters = pickField(item, ['parameters', 'actual_parameters', 'input']);
      const result = pickField(item, ['result', 'results', 'output']);
      return compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        name: readString(item, ['name', 'tool_name'], itemPath) ?? 'action',
        status: lowered(requireString(item, ['status'], itemPath)),
        parameters: parameters ? toPayload(parameters.value) : undefined,
        result: result?.value,
        start_time: readTimestamp(item, ['start_time'], itemPath),
        end_time: readTimestamp(item, ['end_time'], itemPath),
      });
    }),
  };
}

function mapOversight(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  return compact({
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    anomalies: mapItems(raw, ['anomalies', 'active_anomalies'], path, `${context.stepId}-anomaly`, (item, itemPath, fallbackId) =>
      compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        type: readString(item, ['type'], itemPath) ?? 'unspecified',
        severity: lowered(requireString(item, ['severity'], itemPath)),
        description: readString(item, ['description'], itemPath) ?? '',
        detected_at: readTimestamp(item, ['detected_at', 'timestamp'], itemPath),
      }),
    ),
    risks: mapItems(raw, ['risks', 'current_risks'], path, `${context.stepId}-risk`, (item, itemPath, fallbackId) =>
      compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        name: readString(item, ['name'], itemPath) ?? fallbackId,
        level: lowered(requireString(item, ['level'], itemPath)),
        score: readNumber(item, ['score', 'risk_score'], itemPath),
      }),
    ),
    recommendations: readStringList(raw, ['recommendations'], path),
  });
}

function mapInteraction(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  return compact({
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    messages: mapItems(raw, ['messages', 'recent_messages'], path, `${context.stepId}-msg`, (item, itemPath, fallbackId) => {
      const content = pickField(item, ['content', 'body']);
      return compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        type: lowered(requireString(item, ['type'], itemPath)),
        sender_id: requireString(item, ['sender_id', 'from'], itemPath),
        recipient_id: requireString(item, ['recipient_id', 'to'], itemPath),
        content: content ? content.value : null,
        timestamp: readTimestamp(item, ['timestamp'], itemPath),
        correlation_id: readString(item, ['correlation_id'], itemPath),
        reply_to: readString(item, ['reply_to'], itemPath),
      });
    }),
    conversations: mapItems(raw, ['conversations', 'ongoing_conversations'], path, `${context.stepId}-conversation`, (item, itemPath, fallbackId) =>
      compact({
        id: readString(item, ['id'], itemPath) ?? fallbackId,
        participant_ids: readStringList(item, ['participant_ids', 'participants'], itemPath),
        start_time: readTimestamp(item, ['start_time'], itemPath),
        end_time: readTimestamp(item, ['end_time'], itemPath),
        message_count: readNumber(item, ['message_count'], itemPath),
        status: readString(item, ['status'], itemPath),
        topic: readString(item, ['topic'], itemPath),
      }),
    ),
    pending_messages: readNumber(raw, ['pending_messages'], path),
  });
}

/** A nested state section such as `agent_state`, or the snapshot itself when flat. */
function stateSection(raw: RawObject, key: string, path: string): { source: RawObject; path: string } {
  const nested = readObject(raw, [key], path);
  return nested ? { source: nested, path: joinPath(path, key) } : { source: raw, path };
}

function mapState(raw: RawObject, path: string, context: StepContext): SnapshotDraft {
  const agent = stateSection(raw, 'agent_state', path);
  const execution = stateSection(raw, 'execution_state', path);
  const cognitive = stateSection(raw, 'cognitive_state', path);
  return compact({
    timestamp: readTimestamp(raw, ['timestamp'], path) ?? context.start,
    status: lowered(readString(agent.source, ['status'], agent.path)),
    phase: lowered(readString(execution.source, ['phase'], execution.path)),
    health_score: readNumber(agent.source, ['health_score'], agent.path),
    cognitive_load: readNumber(cognitive.source, ['cognitive_load'], cognitive.path),
    active_tasks: readStringList(execution.source, ['active_tasks'], execution.path),
    attention_focus: readStringList(cognitive.source, ['attention_focus'], cognitive.path),
    working_memory: readStringList(cognitive.source, ['working_memory'], cognitive.path),
    active_goals: readStringList(cognitive.source, ['active_goals'], cognitive.path),
    health_indicators: readObject(raw, ['health_indicators'], path),
  });
}

function actionStatus(status: string | undefined, completed: boolean): string {
  const known = ACTION_STATUSES.find((candidate) => candidate === lowered(status));
  return known ?? (completed ? 'completed' : 'executing');
}

/**
 * Layer snapshots for one step: explicit layers first, then derived ones.
 */
export function deriveLayers(context: StepContext): LayerDrafts {
  const layers: LayerDrafts = {};
  const mappers = {
    perception: mapPerception,
    cognition: mapCognition,
    action: mapAction,
    interaction: mapInteraction,
    state: mapState,
    oversight: mapOversight,
  };

  for (const key of LAYER_NAMES) {
    const explicit = readObject(context.raw, [key], context.path);
    if (explicit) {
      layers[key] = mappers[key](explicit, joinPath(context.path, key), context);
    }
  }

  if (!layers.perception && context.messages.length > 0) {
    layers.perception = {
      timestamp: context.start,
      observations: context.messages.map((message, index) => ({
        id: `${context.stepId}-obs-${index}`,
        type: 'text-message',
        content: message.content,
        confidence: 1,
        timestamp: message.timestamp ?? context.start,
        metadata: { role: message.role },
      })),
    };
  }

  if (!layers.action && context.toolCalls.length > 0) {
    layers.action = {
      timestamp: context.start,
      actions: context.toolCalls.map((call, index) =>
        compact({
          id: call.id ?? `${context.stepId}-action-${index}`,
          name: call.name,
          status: actionStatus(call.status, call.output !== undefined || call.end_time !== undefined),
          parameters: call.input,
          result: call.output,
          start_time: call.start_time,
          end_time: call.end_time,
        }),
      ),
    };
  }

  return layers;
}

export function normalizeEnhancedAgentTrace(document: unknown): Run {
  return buildAgentTraceRun(document, { decorateStep: deriveLayers });
}

/** Whether any step, at any nesting level up to MAX_STEP_DEPTH, reports a layer. */
function hasLayerData(steps: RawValue[]): boolean {
  const stack: Array<{ value: RawValue; depth: number }> = steps.map((value) => ({ value, depth: 0 }));
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { value, depth } = frame;
    if (typeof value !== 'object' || value === null || Array.isArray(value)) continue;
    if (LAYER_NAMES.some((key) => value[key] !== undefined)) return true;
    const nested = value.sub_steps ?? value.children;
    if (Array.isArray(nested) && depth < MAX_STEP_DEPTH) {
      for (const child of nested) stack.push({ value: child, depth: depth + 1 });
    }
  }
  return false;
}

export function detectEnhancedAgentTrace(document: RawObject): boolean {
  const steps = document.steps;
  return Array.isArray(steps) && hasLayerData(steps);
}
