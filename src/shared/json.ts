/**
 * JSON value types shared by the model and the normalizer boundary.
 */

import { z } from 'zod';

/** JSON-serializable value. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Containers nested deeper than this are rejected in entity payloads. */
export const MAX_JSON_DEPTH = 128;

export interface JsonProblem {
  kind: 'missing_field' | 'type_mismatch' | 'invariant_violation';
  path: Array<string | number>;
  message: string;
}

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * First reason `value` is not a JSON value at most `maxDepth` containers deep,
 * or null. Walks with an explicit stack, so any nesting is safe to inspect.
 */
export function findJsonProblem(value: unknown, maxDepth = MAX_JSON_DEPTH): JsonProblem | null {
  if (value === undefined) {
    return { kind: 'missing_field', path: [], message: 'Required' };
  }
  const stack: Array<{ node: unknown; path: Array<string | number>; depth: number }> = [
    { node: value, path: [], depth: 0 },
  ];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, path, depth } = frame;
    if (node === null || typeof node === 'string' || typeof node === 'boolean') continue;
    if (typeof node === 'number') {
      if (!Number.isFinite(node)) return { kind: 'type_mismatch', path, message: 'Expected a finite number' };
      continue;
    }
    if (typeof node !== 'object' || (!Array.isArray(node) && !isPlainObject(node))) {
      return { kind: 'type_mismatch', path, message: 'Expected a JSON value' };
    }
    if (depth >= maxDepth) {
      return { kind: 'invariant_violation', path, message: `JSON nesting exceeds ${maxDepth} levels` };
    }
    const entries: Array<[string | number, unknown]> = Array.isArray(node)
      ? node.map((item: unknown, index): [number, unknown] => [index, item])
      : Object.entries(node);
    for (const [key, child] of entries) {
      stack.push({ node: child, path: [...path, key], depth: depth + 1 });
    }
  }
  return null;
}

/** True when `value` nests objects or arrays more than `limit` levels deep. */
export function jsonDepthExceeds(value: unknown, limit: number): boolean {
  const stack: Array<{ node: unknown; depth: number }> = [{ node: value, depth: 0 }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (typeof frame.node !== 'object' || frame.node === null) continue;
    if (frame.depth >= limit) return true;
    for (const child of Object.values(frame.node)) {
      stack.push({ node: child, depth: frame.depth + 1 });
    }
  }
  return false;
}

export const JsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z
  .unknown()
  .superRefine((value, ctx): value is JsonValue => {
    const problem = findJsonProblem(value);
    if (problem) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: problem.path,
        message: problem.message,
        params: { kind: problem.kind },
      });
    }
    return problem === null;
  });

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality over plain data. Keys holding `undefined` count as absent.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => deepEqual(item, b[index]));
  }
  if (!isPlainRecord(a) || !isPlainRecord(b)) return false;

  const keysA = Object.keys(a).filter((key) => a[key] !== undefined);
  const keysB = Object.keys(b).filter((key) => b[key] !== undefined);
  if (keysA.length !== keysB.length) return false;
  return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
