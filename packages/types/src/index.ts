/**
 * @keel/types - Type definitions for the keel configuration validator
 */

// Instance identities, references and the dependency graph
export * from './instances.js';

// Logger and instance manager contracts
export * from './plugins.js';

// Stage outcomes
export * from './pipeline.js';
