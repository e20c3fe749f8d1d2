/**
 * Trace normalizers: raw external trace documents in, validated Runs out.
 */

export type { Normalizer, NormalizerDescriptor, RawObject, RawValue } from './types.js';
export { parseRawTimestamp } from './timestamps.js';
export {
  AGENT_TRACES_FORMAT,
  buildAgentTraceRun,
  detectAgentTrace,
  normalizeAgentTrace,
  type AgentTraceOptions,
  type LayerDrafts,
  type StepContext,
} from './agent-traces.js';
export {
  ENHANCED_AGENT_TRACES_FORMAT,
  deriveLayers,
  detectEnhancedAgentTrace,
  normalizeEnhancedAgentTrace,
} from './enhanced-agent-traces.js';
export { AGENT_EVENTS_FORMAT, detectAgentEvents, normalizeAgentEvents } from './agent-events.js';
export { NormalizerRegistry, createDefaultRegistry } from './registry.js';
