/**
 * Entity constructors.
 *
 * Every constructor validates its input and returns a deeply frozen value.
 * Invalid input raises a ValidationError; nothing is coerced to a default.
 */

import { ValidationError } from '../shared/errors.js';
import {
  ActionSnapshotSchema,
  CognitionSnapshotSchema,
  InteractionSnapshotSchema,
  OversightSnapshotSchema,
  PerceptionSnapshotSchema,
  StateSnapshotSchema,
  type ActionSnapshot,
  type CognitionSnapshot,
  type InteractionSnapshot,
  type OversightSnapshot,
  type PerceptionSnapshot,
  type StateSnapshot,
} from './layers.js';
import {
  MAX_STEP_DEPTH,
  MessageSchema,
  RunSchema,
  StepSchema,
  ToolCallSchema,
  type Message,
  type Run,
  type Step,
  type ToolCall,
} from './schema.js';
import { formatPath, parseEntity } from './validate.js';

function deepFreeze<T>(value: T): T {
  const pending: unknown[] = [value];
  while (pending.length > 0) {
    const current = pending.pop();
    if (typeof current !== 'object' || current === null || Object.isFrozen(current)) {
      continue;
    }
    Object.freeze(current);
    pending.push(...Object.values(current));
  }
  return value;
}

/**
 * Reject step trees nested deeper than MAX_STEP_DEPTH before the recursive
 * schema walks them. `rootKey` is `steps` for a run and `sub_steps` for a step.
 */
function assertNestingDepth(entity: string, input: unknown, rootKey: 'steps' | 'sub_steps'): void {
  const stack: Array<{ node: unknown; key: string; depth: number; path: Array<string | number> }> = [
    { node: input, key: rootKey, depth: 0, path: [] },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (typeof frame.node !== 'object' || frame.node === null) continue;

    const children: unknown = Reflect.get(frame.node, frame.key);
    if (!Array.isArray(children) || children.length === 0) continue;

    if (frame.depth >= MAX_STEP_DEPTH) {
      throw new ValidationError(entity, [
        {
          kind: 'invariant_violation',
          path: formatPath([...frame.path, frame.key]),
          message: `Step nesting exceeds ${MAX_STEP_DEPTH} levels`,
          value: undefined,
        },
      ]);
    }
    children.forEach((child: unknown, index) => {
      stack.push({
        node: child,
        key: 'sub_steps',
        depth: frame.depth + 1,
        path: [...frame.path, frame.key, index],
      });
    });
  }
}

export function createMessage(input: unknown): Message {
  return deepFreeze(parseEntity('message', MessageSchema, input));
}

export function createToolCall(input: unknown): ToolCall {
  return deepFreeze(parseEntity('tool call', ToolCallSchema, input));
}

export function createStep(input: unknown): Step {
  assertNestingDepth('step', input, 'sub_steps');
  return deepFreeze(parseEntity('step', StepSchema, input));
}

export function createRun(input: unknown): Run {
  assertNestingDepth('run', input, 'steps');
  return deepFreeze(parseEntity('run', RunSchema, input));
}

export function createPerceptionSnapshot(input: unknown): PerceptionSnapshot {
  return deepFreeze(parseEntity('perception snapshot', PerceptionSnapshotSchema, input));
}

export function createCognitionSnapshot(input: unknown): CognitionSnapshot {
  return deepFreeze(parseEntity('cognition snapshot', CognitionSnapshotSchema, input));
}

export function createActionSnapshot(input: unknown): ActionSnapshot {
  return deepFreeze(parseEntity('action snapshot', ActionSnapshotSchema, input));
}

export function createInteractionSnapshot(input: unknown): InteractionSnapshot {
  return deepFreeze(parseEntity('interaction snapshot', InteractionSnapshotSchema, input));
}

export function createStateSnapshot(input: unknown): StateSnapshot {
  return deepFreeze(parseEntity('state snapshot', StateSnapshotSchema, input));
}

export function createOversightSnapshot(input: unknown): OversightSnapshot {
  return deepFreeze(parseEntity('oversight snapshot', OversightSnapshotSchema, input));
}
