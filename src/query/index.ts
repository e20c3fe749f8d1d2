/**
 * Read-only queries over a Run. None of them mutate the tree.
 */

export * from './timeline.js';
export * from './aggregate.js';
export * from './filter.js';
