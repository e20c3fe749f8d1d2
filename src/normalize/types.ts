/**
 * Trace normalizer contracts.
 */

import type { Run } from '../ontology/index.js';
import type { JsonObject, JsonValue } from '../shared/json.js';

/** Untyped value of a raw trace document. Never leaves the normalizer. */
export type RawValue = JsonValue;

export type RawObject = JsonObject;

/**
 * Converts one raw trace document into a validated Run, or throws a
 * NormalizationError. Pure: the document is never mutated.
 */
export type Normalizer = (document: unknown) => Run;

export interface NormalizerDescriptor {
  /** Format identifier, e.g. "agent-traces" */
  id: string;
  description: string;
  normalize: Normalizer;
  /** Cheap structural check used by format detection */
  detect?: (document: RawObject) => boolean;
}
