/**
 * Normalizer Registry
 *
 * Maps format identifiers to normalizers. A registry is built once by the
 * caller and passed to whatever dispatches by format; there is no global
 * instance. Supporting a new source format means registering one more
 * normalizer; the model and the query layer stay untouched.
 *
 * Detection order is registration order, so more specific formats must be
 * registered first. The default registry checks the enhanced format before
 * the plain one.
 */

import type { Run } from '../ontology/index.js';
import { NormalizationError, OntologyError } from '../shared/errors.js';
import { isJsonObject } from '../shared/json.js';
import { createLogger } from '../shared/logger.js';
import { AGENT_EVENTS_FORMAT, detectAgentEvents, normalizeAgentEvents } from './agent-events.js';
import {
  AGENT_TRACES_FORMAT,
  detectAgentTrace,
  normalizeAgentTrace,
} from './agent-traces.js';
import {
  ENHANCED_AGENT_TRACES_FORMAT,
  detectEnhancedAgentTrace,
  normalizeEnhancedAgentTrace,
} from './enhanced-agent-traces.js';
import type { NormalizerDescriptor } from './types.js';

const log = createLogger('normalize');

export class NormalizerRegistry {
  private readonly formats = new Map<string, NormalizerDescriptor>();

  constructor(descriptors: NormalizerDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Register a normalizer. Format ids are unique within a registry.
   */
  register(descriptor: NormalizerDescriptor): this {
    if (this.formats.has(descriptor.id)) {
      throw new OntologyError(`Format already registered: ${descriptor.id}`, 'DUPLICATE_FORMAT');
    }
    this.formats.set(descriptor.id, descriptor);
    return this;
  }

  get(format: string): NormalizerDescriptor | null {
    return this.formats.get(format) ?? null;
  }

  has(format: string): boolean {
    return this.formats.has(format);
  }

  list(): Array<{ id: string; description: string }> {
    return [...this.formats.values()].map(({ id, description }) => ({ id, description }));
  }

  /**
   * Normalize `document` with the normalizer registered for `format`.
   */
  normalize(format: string, document: unknown): Run {
    const descriptor = this.formats.get(format);
    if (!descriptor) {
      throw new NormalizationError('unrecognized_shape', `Unknown trace format "${format}"`, '', format);
    }
    log.debug(`normalizing with ${format}`);
    return descriptor.normalize(document);
  }

  /**
   * First registered format whose detector accepts the document, or null.
   */
  detect(document: unknown): string | null {
    if (!isJsonObject(document)) return null;
    for (const descriptor of this.formats.values()) {
      if (descriptor.detect?.(document)) {
        log.debug(`detected format ${descriptor.id}`);
        return descriptor.id;
      }
    }
    return null;
  }
}

export function createDefaultRegistry(): NormalizerRegistry {
  return new NormalizerRegistry([
    {
      id: ENHANCED_AGENT_TRACES_FORMAT,
      description: 'Agent traces with perception, cognition, action and oversight layers',
      normalize: normalizeEnhancedAgentTrace,
      detect: detectEnhancedAgentTrace,
    },
    {
      id: AGENT_TRACES_FORMAT,
      description: 'Agent traces: flat step list with messages and tool calls',
      normalize: normalizeAgentTrace,
      detect: detectAgentTrace,
    },
    {
      id: AGENT_EVENTS_FORMAT,
      description: 'Agent event streams: user messages, responses, tool calls and tool results',
      normalize: normalizeAgentEvents,
      detect: detectAgentEvents,
    },
  ]);
}
