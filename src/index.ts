/**
 * blueprinter: declarative project scaffolding.
 * Main library exports barrel file.
 */

// Values
export * from './core/values/types.js';

// Predicates and templates
export * from './core/predicates/index.js';
export * from './core/template/index.js';

// Random defaults
export * from './core/random/source.js';

// Blueprints
export * from './core/blueprint/index.js';

// Resolver
export * from './core/resolver/index.js';

// Generation
export * from './core/generate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
