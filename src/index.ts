/**
 * agent-run-ontology
 *
 * Public API for programmatic usage.
 */

// Ontology model
export * from './ontology/index.js';

// Trace normalizers
export * from './normalize/index.js';

// Queries
export * from './query/index.js';

// Errors and shared types
export {
  OntologyError,
  ValidationError,
  NormalizationError,
  ConfigError,
  type ValidationErrorKind,
  type ValidationIssue,
  type NormalizationErrorKind,
} from './shared/errors.js';
export { MAX_JSON_DEPTH, type JsonObject, type JsonValue } from './shared/json.js';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './shared/logger.js';

// Configuration
export {
  defaultConfig,
  loadConfig,
  saveConfig,
  localConfigDir,
  AgentRunConfigSchema,
  type AgentRunConfig,
} from './config.js';
