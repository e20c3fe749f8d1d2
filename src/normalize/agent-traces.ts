/**
 * Normalizer for the "agent-traces" export format.
 *
 * Steps arrive as a flat list in execution order. A step may point at its
 * parent with `parent_id`, or nest children natively under `sub_steps` /
 * `children`. A step whose `type` is "message" or "tool" carries a single
 * message or tool call inline; steps may also carry `messages` and
 * `tool_calls` arrays, and top-level `messages` / `tool_calls` may attach to a
 * step through `step_id`.
 */

import { createRun, RUN_STATUSES, type Run, type RunStatus } from '../ontology/index.js';
import { NormalizationError, ValidationError } from '../shared/errors.js';
import { isJsonObject } from '../shared/json.js';
import {
  assertDocumentDepth,
  compact,
  expectObject,
  joinPath,
  pickField,
  readArray,
  readObject,
  readString,
  readStringList,
  readTimestamp,
  requireString,
  toPayload,
  toText,
} from './fields.js';
import type { RawObject, RawValue } from './types.js';

export const AGENT_TRACES_FORMAT = 'agent-traces';

const RUN_STATUS_ALIASES: Record<string, RunStatus> = {
  complete: 'completed',
  succeeded: 'completed',
  success: 'completed',
  error: 'failed',
  errored: 'failed',
  canceled: 'cancelled',
  in_progress: 'running',
};

const ROLE_ALIASES: Record<string, string> = {
  human: 'user',
  ai: 'assistant',
  model: 'assistant',
  function: 'tool',
  developer: 'system',
};

const STEP_START_KEYS = ['start_time', 'started_at', 'timestamp'] as const;
const STEP_END_KEYS = ['end_time', 'ended_at', 'completed_at'] as const;

export interface MessageDraft {
  id?: string;
  role: string;
  content: string;
  timestamp?: string;
}

export interface ToolCallDraft {
  id?: string;
  name: string;
  input: RawObject;
  output?: RawObject;
  status?: string;
  start_time?: string;
  end_time?: string;
}

/** Snapshot input handed to the model, validated there. */
export type SnapshotDraft = Record<string, unknown>;

export interface LayerDrafts {
  perception?: SnapshotDraft;
  cognition?: SnapshotDraft;
  action?: SnapshotDraft;
  interaction?: SnapshotDraft;
  state?: SnapshotDraft;
  oversight?: SnapshotDraft;
}

interface StepDraft extends LayerDrafts {
  id: string;
  name: string;
  start_time?: string;
  end_time?: string;
  status?: string;
  error?: { message: string; code?: string };
  messages: MessageDraft[];
  tool_calls: ToolCallDraft[];
  sub_steps: StepDraft[];
  metadata: RawObject;
}

interface StepRecord {
  id: string;
  type?: string;
  raw: RawObject;
  path: string;
  parentId: string | null;
  /** Where the parent reference came from, for error reporting */
  parentPath: string;
  draft: StepDraft;
  children: StepRecord[];
}

/** What a step decorator sees once the step's start time is resolved. */
export interface StepContext {
  stepId: string;
  stepType?: string;
  path: string;
  start: string;
  raw: RawObject;
  messages: readonly MessageDraft[];
  toolCalls: readonly ToolCallDraft[];
}

export interface AgentTraceOptions {
  /** Adds layer snapshots to a step; used by the enhanced format */
  decorateStep?: (context: StepContext) => LayerDrafts;
}

function mapRole(role: string): string {
  const lowered = role.toLowerCase();
  return ROLE_ALIASES[lowered] ?? lowered;
}

function mapRunStatus(status: string | undefined): RunStatus | undefined {
  if (status === undefined) return undefined;
  const lowered = status.toLowerCase();
  const known = RUN_STATUSES.find((candidate) => candidate === lowered);
  return known ?? RUN_STATUS_ALIASES[lowered] ?? 'unknown';
}

export function normalizeMessage(value: RawValue, path: string): MessageDraft {
  const raw = expectObject(value, path, 'message');
  const content = pickField(raw, ['content', 'text']);
  return compact({
    id: readString(raw, ['id', 'message_id'], path),
    role: mapRole(requireString(raw, ['role', 'author'], path)),
    content: content ? toText(content.value) : '',
    timestamp: readTimestamp(raw, ['timestamp', 'created_at', 'time'], path),
  });
}

export function normalizeToolCall(value: RawValue, path: string): ToolCallDraft {
  const raw = expectObject(value, path, 'tool call');
  const input = pickField(raw, ['input', 'arguments', 'args', 'parameters']);
  const output = pickField(raw, ['output', 'result']);
  return compact({
    id: readString(raw, ['id', 'call_id'], path),
    name: requireString(raw, ['name', 'tool_name', 'tool'], path),
    input: input ? toPayload(input.value) : {},
    output: output ? toPayload(output.value) : undefined,
    status: readString(raw, ['status'], path),
    start_time: readTimestamp(raw, ['start_time', 'started_at', 'timestamp'], path),
    end_time: readTimestamp(raw, ['end_time', 'ended_at', 'completed_at'], path),
  });
}

function readStepError(raw: RawObject, path: string): StepDraft['error'] {
  const field = pickField(raw, ['error']);
  if (!field) return undefined;
  if (isJsonObject(field.value)) {
    const errorPath = joinPath(path, 'error');
    const message = readString(field.value, ['message', 'detail'], errorPath);
    return compact({
      message: message ?? JSON.stringify(field.value),
      code: readString(field.value, ['code', 'type'], errorPath),
    });
  }
  return { message: toText(field.value) };
}

function buildStepDraft(raw: RawObject, id: string, type: string | undefined, path: string): StepDraft {
  const start = readTimestamp(raw, STEP_START_KEYS, path);
  const messages = (readArray(raw, ['messages'], path)?.value ?? []).map((item, index) =>
    normalizeMessage(item, joinPath(joinPath(path, 'messages'), index)),
  );
  const toolCallsField = readArray(raw, ['tool_calls', 'tools'], path);
  const toolCalls = (toolCallsField?.value ?? []).map((item, index) =>
    normalizeToolCall(item, joinPath(joinPath(path, toolCallsField?.key ?? 'tool_calls'), index)),
  );

  if (type === 'message') {
    const content = pickField(raw, ['content', 'text']);
    messages.unshift(
      compact({
        id,
        role: mapRole(readString(raw, ['role'], path) ?? 'assistant'),
        content: content ? toText(content.value) : '',
        timestamp: start,
      }),
    );
  } else if (type === 'tool' || type === 'tool_call') {
    const input = pickField(raw, ['input', 'arguments']);
    const output = pickField(raw, ['output', 'result']);
    toolCalls.unshift(
      compact({
        id,
        name: requireString(raw, ['tool_name', 'name'], path),
        input: input ? toPayload(input.value) : {},
        output: output ? toPayload(output.value) : undefined,
        start_time: start,
        end_time: readTimestamp(raw, ['completed_at'], path),
      }),
    );
  }

  return compact({
    id,
    name: readString(raw, ['name', 'title'], path) ?? type ?? 'step',
    start_time: start,
    end_time: readTimestamp(raw, STEP_END_KEYS, path),
    status: readString(raw, ['status'], path),
    error: readStepError(raw, path),
    messages,
    tool_calls: toolCalls,
    sub_steps: [],
    metadata: readObject(raw, ['metadata'], path) ?? {},
  });
}

/** Ids written in the document, at any nesting level. */
function collectExplicitIds(rawSteps: RawValue[], basePath: string): Set<string> {
  const ids = new Set<string>();
  const pending = rawSteps.map((value, index) => ({ value, path: joinPath(basePath, index) }));
  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const raw = expectObject(next.value, next.path, 'step');
    const id = readString(raw, ['id', 'step_id'], next.path);
    if (id !== undefined) ids.add(id);
    const nested = readArray(raw, ['sub_steps', 'children'], next.path);
    if (nested) {
      const nestedPath = joinPath(next.path, nested.key);
      nested.value.forEach((value, index) => pending.push({ value, path: joinPath(nestedPath, index) }));
    }
  }
  return ids;
}

/**
 * Flatten native nesting into records in pre-order, keeping source order.
 * Steps without an id get `step-<n>`, skipping any id the document uses.
 */
function collectStepRecords(rawSteps: RawValue[], basePath: string): StepRecord[] {
  const records: StepRecord[] = [];
  const seen = new Set<string>();
  const explicit = collectExplicitIds(rawSteps, basePath);
  let fallbackIndex = 0;
  const fallbackId = (): string => {
    fallbackIndex = Math.max(fallbackIndex, records.length);
    let candidate = `step-${fallbackIndex}`;
    while (explicit.has(candidate) || seen.has(candidate)) {
      fallbackIndex += 1;
      candidate = `step-${fallbackIndex}`;
    }
    fallbackIndex += 1;
    return candidate;
  };
  const pending: Array<{ value: RawValue; path: string; nestParent: string | null }> = rawSteps
    .map((value, index) => ({ value, path: joinPath(basePath, index), nestParent: null }))
    .reverse();

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const raw = expectObject(next.value, next.path, 'step');
    const id = readString(raw, ['id', 'step_id'], next.path) ?? fallbackId();
    if (seen.has(id)) {
      throw new NormalizationError('duplicate_id', `Duplicate step id "${id}"`, joinPath(next.path, 'id'), id);
    }
    seen.add(id);

    const type = readString(raw, ['type', 'kind'], next.path);
    const explicitParent = readString(raw, ['parent_id', 'parent_step_id'], next.path);
    records.push({
      id,
      type,
      raw,
      path: next.path,
      parentId: explicitParent ?? next.nestParent,
      parentPath: explicitParent !== undefined ? joinPath(next.path, 'parent_id') : next.path,
      draft: buildStepDraft(raw, id, type, next.path),
      children: [],
    });

    const nested = readArray(raw, ['sub_steps', 'children'], next.path);
    if (nested) {
      const nestedPath = joinPath(next.path, nested.key);
      for (let index = nested.value.length - 1; index >= 0; index -= 1) {
        pending.push({ value: nested.value[index], path: joinPath(nestedPath, index), nestParent: id });
      }
    }
  }

  return records;
}

/**
 * Reject parent references that point nowhere or loop back on themselves.
 * Each parent chain is followed once, tracking the ids on the current path.
 */
function assertParentLinks(records: StepRecord[], byId: Map<string, StepRecord>): void {
  for (const record of records) {
    if (record.parentId !== null && !byId.has(record.parentId)) {
      throw new NormalizationError(
        'dangling_reference',
        `Step "${record.id}" references unknown parent "${record.parentId}"`,
        record.parentPath,
        record.parentId,
      );
    }
  }

  const acyclic = new Set<string>();
  for (const record of records) {
    const chain: string[] = [];
    const onChain = new Set<string>();
    let current: StepRecord | undefined = record;
    while (current && !acyclic.has(current.id)) {
      if (onChain.has(current.id)) {
        throw new NormalizationError(
          'cyclic_reference',
          `Step "${current.id}" is its own ancestor (${[...chain, current.id].join(' → ')})`,
          current.parentPath,
          [...chain, current.id],
        );
      }
      onChain.add(current.id);
      chain.push(current.id);
      current = current.parentId === null ? undefined : byId.get(current.parentId);
    }
    for (const id of chain) acyclic.add(id);
  }
}

function attachByReference(
  root: RawObject,
  keys: readonly string[],
  byId: Map<string, StepRecord>,
  attach: (record: StepRecord, value: RawValue, path: string) => void,
): void {
  const field = readArray(root, keys, '');
  if (!field) return;
  field.value.forEach((value, index) => {
    const path = joinPath(field.key, index);
    const raw = expectObject(value, path, 'entry');
    const stepId = requireString(raw, ['step_id'], path);
    const record = byId.get(stepId);
    if (!record) {
      throw new NormalizationError(
        'dangling_reference',
        `Entry references unknown step "${stepId}"`,
        joinPath(path, 'step_id'),
        stepId,
      );
    }
    attach(record, value, path);
  });
}

function earliest(timestamps: Array<string | undefined>): string | undefined {
  let result: string | undefined;
  for (const timestamp of timestamps) {
    if (timestamp !== undefined && (result === undefined || timestamp < result)) {
      result = timestamp;
    }
  }
  return result;
}

/**
 * Build a Run from an agent-traces document. All-or-nothing: any problem
 * raises a NormalizationError and no Run is returned.
 */
export function buildAgentTraceRun(document: unknown, options: AgentTraceOptions = {}): Run {
  assertDocumentDepth(document);
  const root = expectObject(document, '', 'trace document');
  const runId = requireString(root, ['id', 'trace_id', 'run_id'], '');
  const stepsField = readArray(root, ['steps'], '');
  if (!stepsField) {
    throw new NormalizationError('unrecognized_shape', 'Trace document has no "steps" array', 'steps');
  }

  const records = collectStepRecords(stepsField.value, 'steps');
  const byId = new Map(records.map((record): [string, StepRecord] => [record.id, record]));
  assertParentLinks(records, byId);

  attachByReference(root, ['messages'], byId, (record, value, path) => {
    record.draft.messages.push(normalizeMessage(value, path));
  });
  attachByReference(root, ['tool_calls'], byId, (record, value, path) => {
    record.draft.tool_calls.push(normalizeToolCall(value, path));
  });

  const roots: StepRecord[] = [];
  for (const record of records) {
    const parent = record.parentId === null ? undefined : byId.get(record.parentId);
    if (parent) {
      parent.children.push(record);
      parent.draft.sub_steps.push(record.draft);
    } else {
      roots.push(record);
    }
  }

  const runStart =
    readTimestamp(root, ['started_at', 'start_time', 'created_at'], '') ??
    earliest(records.map((record) => record.draft.start_time));
  if (runStart === undefined) {
    throw new NormalizationError('unrecognized_shape', 'Trace has no start time on the run or any step', 'started_at');
  }

  // Steps without a start inherit their parent's, then the run's.
  const pending: Array<{ record: StepRecord; inherited: string }> = roots
    .map((record) => ({ record, inherited: runStart }))
    .reverse();
  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const { record } = next;
    const start = record.draft.start_time ?? next.inherited;
    record.draft.start_time = start;

    if (options.decorateStep) {
      Object.assign(
        record.draft,
        compact(
          options.decorateStep({
            stepId: record.id,
            stepType: record.type,
            path: record.path,
            start,
            raw: record.raw,
            messages: record.draft.messages,
            toolCalls: record.draft.tool_calls,
          }),
        ),
      );
    }

    for (let index = record.children.length - 1; index >= 0; index -= 1) {
      pending.push({ record: record.children[index], inherited: start });
    }
  }

  const agentId = readString(root, ['agent_id'], '');
  const draft = compact({
    id: runId,
    name: readString(root, ['name', 'agent_name'], '') ?? `Agent run ${runId}`,
    start_time: runStart,
    end_time: readTimestamp(root, ['ended_at', 'end_time', 'completed_at'], ''),
    status: mapRunStatus(readString(root, ['status'], '')),
    agent:
      agentId === undefined
        ? undefined
        : compact({
            id: agentId,
            name: readString(root, ['agent_name'], ''),
            model: readString(root, ['model'], ''),
          }),
    steps: roots.map((record) => record.draft),
    tags: readStringList(root, ['tags'], '') ?? [],
    metadata: readObject(root, ['metadata'], '') ?? {},
  });

  return createRunFromDraft(draft);
}

/**
 * Hand a run draft to the model, reporting a ValidationError as
 * NormalizationError(`invalid_entity`) with the original as `cause`.
 */
export function createRunFromDraft(draft: object): Run {
  try {
    return createRun(draft);
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new NormalizationError('invalid_entity', err.message, err.path, err.value, { cause: err });
    }
    throw err;
  }
}

export function normalizeAgentTrace(document: unknown): Run {
  return buildAgentTraceRun(document);
}

export function detectAgentTrace(document: RawObject): boolean {
  return Array.isArray(document.steps) && pickField(document, ['id', 'trace_id', 'run_id']) !== undefined;
}
