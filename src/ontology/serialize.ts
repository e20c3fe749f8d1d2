/**
 * Canonical serialized form of every entity.
 *
 * The document mirrors the model's field names, carries timestamps as ISO-8601
 * UTC strings and omits absent optional fields.
 */

import { ValidationError } from '../shared/errors.js';
import { deepEqual, type JsonObject, type JsonValue } from '../shared/json.js';
import type {
  ActionSnapshot,
  CognitionSnapshot,
  InteractionSnapshot,
  OversightSnapshot,
  PerceptionSnapshot,
  StateSnapshot,
} from './layers.js';
import {
  createActionSnapshot,
  createCognitionSnapshot,
  createInteractionSnapshot,
  createMessage,
  createOversightSnapshot,
  createPerceptionSnapshot,
  createRun,
  createStateSnapshot,
  createStep,
  createToolCall,
} from './model.js';
import type { Message, Run, Step, ToolCall } from './schema.js';

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return value;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item) ?? null);
  }
  if (typeof value === 'object') {
    const document: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) {
        document[key] = converted;
      }
    }
    return document;
  }
  throw new TypeError(`Value of type ${typeof value} is not serializable`);
}

function toDocument(entity: object, name: string): JsonObject {
  const document = toJsonValue(entity);
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    throw new TypeError(`${name} did not serialize to an object`);
  }
  return document;
}

export function serializeRun(run: Run): JsonObject {
  return toDocument(run, 'Run');
}

export function deserializeRun(document: unknown): Run {
  return createRun(document);
}

export function serializeStep(step: Step): JsonObject {
  return toDocument(step, 'Step');
}

export function deserializeStep(document: unknown): Step {
  return createStep(document);
}

export function serializeMessage(message: Message): JsonObject {
  return toDocument(message, 'Message');
}

export function deserializeMessage(document: unknown): Message {
  return createMessage(document);
}

export function serializeToolCall(call: ToolCall): JsonObject {
  return toDocument(call, 'ToolCall');
}

export function deserializeToolCall(document: unknown): ToolCall {
  return createToolCall(document);
}

// ─── Layer snapshots ─────────────────────────────────────────

export function serializePerceptionSnapshot(snapshot: PerceptionSnapshot): JsonObject {
  return toDocument(snapshot, 'PerceptionSnapshot');
}

export function deserializePerceptionSnapshot(document: unknown): PerceptionSnapshot {
  return createPerceptionSnapshot(document);
}

export function serializeCognitionSnapshot(snapshot: CognitionSnapshot): JsonObject {
  return toDocument(snapshot, 'CognitionSnapshot');
}

export function deserializeCognitionSnapshot(document: unknown): CognitionSnapshot {
  return createCognitionSnapshot(document);
}

export function serializeActionSnapshot(snapshot: ActionSnapshot): JsonObject {
  return toDocument(snapshot, 'ActionSnapshot');
}

export function deserializeActionSnapshot(document: unknown): ActionSnapshot {
  return createActionSnapshot(document);
}

export function serializeInteractionSnapshot(snapshot: InteractionSnapshot): JsonObject {
  return toDocument(snapshot, 'InteractionSnapshot');
}

export function deserializeInteractionSnapshot(document: unknown): InteractionSnapshot {
  return createInteractionSnapshot(document);
}

export function serializeStateSnapshot(snapshot: StateSnapshot): JsonObject {
  return toDocument(snapshot, 'StateSnapshot');
}

export function deserializeStateSnapshot(document: unknown): StateSnapshot {
  return createStateSnapshot(document);
}

export function serializeOversightSnapshot(snapshot: OversightSnapshot): JsonObject {
  return toDocument(snapshot, 'OversightSnapshot');
}

export function deserializeOversightSnapshot(document: unknown): OversightSnapshot {
  return createOversightSnapshot(document);
}

export function toJson(run: Run, indent = 2): string {
  return JSON.stringify(serializeRun(run), null, indent);
}

export function fromJson(text: string): Run {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new ValidationError('run', [
      {
        kind: 'type_mismatch',
        path: '',
        message: `Not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        value: text,
      },
    ]);
  }
  return deserializeRun(document);
}

/**
 * Structural equality between two entities (value semantics, not identity).
 */
export function entitiesEqual<T>(a: T, b: T): boolean {
  return deepEqual(a, b);
}
