/**
 * Normalizer for the "agent-events" export format.
 *
 * A document is a flat event stream:
 *
 *   { "trace_id": "...", "agent_name": "...", "events": [
 *       { "type": "user_message", "timestamp": "...", "payload": { "content": "..." } },
 *       { "type": "tool_call", "payload": { "call_id": "c1", "name": "search", "input": {...} } },
 *       { "type": "tool_result", "payload": { "call_id": "c1", "output": {...} } } ] }
 *
 * Each event becomes one top-level step named after its type. A tool_result
 * completes the tool call it names by `call_id` (or the latest open call when
 * it names none) and records the result as a `tool` message on its own step.
 */

import type { Run } from '../ontology/index.js';
import { NormalizationError } from '../shared/errors.js';
import { isJsonObject } from '../shared/json.js';
import { createRunFromDraft, type MessageDraft, type ToolCallDraft } from './agent-traces.js';
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

export const AGENT_EVENTS_FORMAT = 'agent-events';

interface EventStepDraft {
  id: string;
  name: string;
  start_time: string;
  messages: MessageDraft[];
  tool_calls: ToolCallDraft[];
  metadata: RawObject;
}

interface EventRecord {
  raw: RawObject;
  path: string;
  type: string;
  timestamp?: string;
  payload: RawValue;
}

function readEvent(value: RawValue, path: string): EventRecord {
  const raw = expectObject(value, path, 'event');
  const payload = pickField(raw, ['payload', 'data']);
  return compact({
    raw,
    path,
    type: requireString(raw, ['type', 'event_type'], path).toLowerCase(),
    timestamp: readTimestamp(raw, ['timestamp', 'time', 'created_at'], path),
    payload: payload ? payload.value : {},
  });
}

function payloadText(payload: RawValue): string {
  if (isJsonObject(payload)) {
    const content = pickField(payload, ['content', 'text', 'message']);
    return content ? toText(content.value) : '';
  }
  return toText(payload);
}

function payloadObject(payload: RawValue): RawObject {
  return isJsonObject(payload) ? payload : {};
}

/** Event ids that the document spells out, so generated ids can avoid them. */
function explicitIds(events: EventRecord[]): Set<string> {
  const ids = new Set<string>();
  for (const event of events) {
    const id = readString(event.raw, ['id', 'event_id'], event.path);
    if (id !== undefined) ids.add(id);
  }
  return ids;
}

/**
 * Build a Run from an agent-events document. All-or-nothing, like the other
 * normalizers.
 */
export function normalizeAgentEvents(document: unknown): Run {
  assertDocumentDepth(document);
  const root = expectObject(document, '', 'event document');
  const runId = requireString(root, ['trace_id', 'id', 'run_id'], '');
  const eventsField = readArray(root, ['events'], '');
  if (!eventsField) {
    throw new NormalizationError('unrecognized_shape', 'Event document has no "events" array', 'events');
  }

  const events = eventsField.value.map((value, index) => readEvent(value, joinPath(eventsField.key, index)));
  const runStart =
    readTimestamp(root, ['started_at', 'start_time', 'created_at'], '') ??
    events.map((event) => event.timestamp).find((timestamp) => timestamp !== undefined);
  if (runStart === undefined) {
    throw new NormalizationError('unrecognized_shape', 'Trace has no start time on the run or any event', 'started_at');
  }

  const taken = explicitIds(events);
  const seen = new Set<string>();
  const openCalls: ToolCallDraft[] = [];
  const callsById = new Map<string, ToolCallDraft>();
  const steps: EventStepDraft[] = [];
  let previousStart = runStart;
  let fallbackIndex = 0;

  for (const event of events) {
    let id = readString(event.raw, ['id', 'event_id'], event.path);
    if (id === undefined) {
      do {
        id = `event-${fallbackIndex}`;
        fallbackIndex += 1;
      } while (taken.has(id) || seen.has(id));
    } else if (seen.has(id)) {
      throw new NormalizationError('duplicate_id', `Duplicate event id "${id}"`, joinPath(event.path, 'id'), id);
    }
    seen.add(id);

    // Events without a time happen when the previous one did.
    const start = event.timestamp ?? previousStart;
    previousStart = start;
    const payloadPath = joinPath(event.path, 'payload');
    const step: EventStepDraft = {
      id,
      name: event.type,
      start_time: start,
      messages: [],
      tool_calls: [],
      metadata: readObject(event.raw, ['metadata'], event.path) ?? {},
    };

    switch (event.type) {
      case 'user_message':
      case 'assistant_response':
        step.messages.push({
          role: event.type === 'user_message' ? 'user' : 'assistant',
          content: payloadText(event.payload),
          timestamp: start,
        });
        break;
      case 'tool_call': {
        const payload = payloadObject(event.payload);
        const input = pickField(payload, ['input', 'arguments', 'args']);
        const call: ToolCallDraft = compact({
          id: readString(payload, ['call_id', 'id'], payloadPath) ?? id,
          name: requireString(payload, ['name', 'tool_name', 'tool'], payloadPath),
          input: input ? toPayload(input.value) : {},
          start_time: start,
        });
        step.tool_calls.push(call);
        openCalls.push(call);
        if (call.id !== undefined) callsById.set(call.id, call);
        break;
      }
      case 'tool_result': {
        const payload = payloadObject(event.payload);
        const callId = readString(payload, ['call_id', 'tool_call_id'], payloadPath);
        const call = callId === undefined ? openCalls.at(-1) : callsById.get(callId);
        if (!call) {
          throw new NormalizationError(
            'dangling_reference',
            callId === undefined ? 'Tool result follows no open tool call' : `Tool result names unknown call "${callId}"`,
            callId === undefined ? payloadPath : joinPath(payloadPath, 'call_id'),
            callId,
          );
        }
        if (call.output !== undefined) {
          throw new NormalizationError(
            'duplicate_id',
            `Tool call "${callId ?? call.name}" already has a result`,
            joinPath(payloadPath, 'call_id'),
            callId,
          );
        }
        const output = pickField(payload, ['output', 'result', 'content']);
        call.output = toPayload(output ? output.value : event.payload);
        call.end_time = start;
        openCalls.splice(openCalls.indexOf(call), 1);
        step.messages.push({ role: 'tool', content: toText(output ? output.value : event.payload), timestamp: start });
        break;
      }
      default:
        step.metadata = { ...step.metadata, payload: event.payload };
    }

    steps.push(step);
  }

  const agentName = readString(root, ['agent_name', 'agent'], '');
  return createRunFromDraft(
    compact({
      id: runId,
      name: readString(root, ['name'], '') ?? agentName ?? `Agent run ${runId}`,
      start_time: runStart,
      end_time: readTimestamp(root, ['ended_at', 'end_time', 'completed_at'], ''),
      agent: agentName === undefined ? undefined : { id: agentName, name: agentName },
      steps,
      tags: readStringList(root, ['tags'], '') ?? [],
      metadata: readObject(root, ['metadata'], '') ?? {},
    }),
  );
}

export function detectAgentEvents(document: RawObject): boolean {
  return (
    Array.isArray(document.events) &&
    !Array.isArray(document.steps) &&
    pickField(document, ['trace_id', 'id', 'run_id']) !== undefined
  );
}
