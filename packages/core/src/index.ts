/**
 * @authflow/core - Shared logging and error primitives for Authflow packages
 *
 * @packageDocumentation
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';
