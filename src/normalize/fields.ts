/**
 * Field readers over raw trace objects.
 *
 * Each reader takes a list of accepted source field names (canonical name
 * first), returns undefined when none is present, and raises a
 * NormalizationError naming the field path when a value has the wrong shape.
 */

import { NormalizationError } from '../shared/errors.js';
import { isJsonObject, jsonDepthExceeds } from '../shared/json.js';
import { parseRawTimestamp } from './timestamps.js';
import type { RawObject, RawValue } from './types.js';

/** Raw documents nested deeper than this are refused before any field is read. */
export const MAX_DOCUMENT_DEPTH = 1024;

export function assertDocumentDepth(document: unknown): void {
  if (jsonDepthExceeds(document, MAX_DOCUMENT_DEPTH)) {
    throw new NormalizationError(
      'unrecognized_shape',
      `Trace document nests deeper than ${MAX_DOCUMENT_DEPTH} levels`,
      '',
    );
  }
}

export interface FieldValue {
  key: string;
  value: RawValue;
}

export function joinPath(base: string, key: string | number): string {
  if (typeof key === 'number') return `${base}[${key}]`;
  return base ? `${base}.${key}` : key;
}

/** First of `keys` holding a value other than null/undefined. */
export function pickField(source: RawObject, keys: readonly string[]): FieldValue | undefined {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null) {
      return { key, value };
    }
  }
  return undefined;
}

export function expectObject(value: unknown, path: string, what: string): RawObject {
  if (!isJsonObject(value)) {
    throw new NormalizationError('unrecognized_shape', `Expected ${what} to be an object`, path, value);
  }
  return value;
}

export function readString(source: RawObject, keys: readonly string[], path: string): string | undefined {
  const field = pickField(source, keys);
  if (!field) return undefined;
  if (typeof field.value === 'string') return field.value;
  if (typeof field.value === 'number' || typeof field.value === 'boolean') return String(field.value);
  throw new NormalizationError(
    'unrecognized_shape',
    `Expected a string for "${field.key}"`,
    joinPath(path, field.key),
    field.value,
  );
}

export function requireString(source: RawObject, keys: readonly string[], path: string): string {
  const value = readString(source, keys, path);
  if (value === undefined || value === '') {
    throw new NormalizationError(
      'unrecognized_shape',
      `Missing required field "${keys[0]}"`,
      joinPath(path, keys[0]),
    );
  }
  return value;
}

export function readTimestamp(source: RawObject, keys: readonly string[], path: string): string | undefined {
  const field = pickField(source, keys);
  if (!field) return undefined;
  return parseRawTimestamp(field.value, joinPath(path, field.key));
}

export function readArray(source: RawObject, keys: readonly string[], path: string): FieldValue & { value: RawValue[] } | undefined {
  const field = pickField(source, keys);
  if (!field) return undefined;
  if (!Array.isArray(field.value)) {
    throw new NormalizationError(
      'unrecognized_shape',
      `Expected an array for "${field.key}"`,
      joinPath(path, field.key),
      field.value,
    );
  }
  return { key: field.key, value: field.value };
}

export function readObject(source: RawObject, keys: readonly string[], path: string): RawObject | undefined {
  const field = pickField(source, keys);
  if (!field) return undefined;
  return expectObject(field.value, joinPath(path, field.key), `"${field.key}"`);
}

export function readNumber(source: RawObject, keys: readonly string[], path: string): number | undefined {
  const field = pickField(source, keys);
  if (!field) return undefined;
  if (typeof field.value === 'number') return field.value;
  if (typeof field.value === 'string' && field.value.trim() !== '' && Number.isFinite(Number(field.value))) {
    return Number(field.value);
  }
  throw new NormalizationError(
    'unrecognized_shape',
    `Expected a number for "${field.key}"`,
    joinPath(path, field.key),
    field.value,
  );
}

export function readStringList(source: RawObject, keys: readonly string[], path: string): string[] | undefined {
  const field = readArray(source, keys, path);
  if (!field) return undefined;
  return field.value.map((item, index) => {
    if (typeof item === 'string') return item;
    throw new NormalizationError(
      'unrecognized_shape',
      `Expected a string in "${field.key}"`,
      joinPath(joinPath(path, field.key), index),
      item,
    );
  });
}

/**
 * Coerce a payload into a JSON mapping. JSON-encoded object strings are
 * decoded; any other scalar or array is wrapped as `{ value }`.
 */
export function toPayload(value: RawValue): RawObject {
  if (isJsonObject(value)) return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
      try {
        const decoded: unknown = JSON.parse(trimmed);
        if (isJsonObject(decoded)) return decoded;
      } catch {
        // Keep as string if not valid JSON
        return { value };
      }
    }
  }
  return { value };
}

/**
 * Message content as text. Structured content is JSON-encoded.
 */
export function toText(value: RawValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Shallow copy without keys whose value is undefined, so absent fields stay absent.
 */
export function compact<T extends object>(value: T): T {
  const copy = { ...value };
  for (const key of Object.keys(copy)) {
    if (Reflect.get(copy, key) === undefined) {
      Reflect.deleteProperty(copy, key);
    }
  }
  return copy;
}
