/**
 * Ontology model: entity schemas, constructors, traversal and serialization.
 */

export * from './schema.js';
export * from './layers.js';
export * from './timestamp.js';
export * from './model.js';
export * from './tree.js';
export * from './serialize.js';
export { formatPath } from './validate.js';
